export { toLines } from './segmenter';
export type { SegmentOptions } from './segmenter';
export { substituteVariables } from './substitution';
export { recognizeDirective } from './directives';
export type { Directive } from './directives';
export { interpretScheme } from './interpreter';
