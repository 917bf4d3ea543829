export { SchemeTestHandle } from './scheme-handle';
export { expectScheme, expectSchemeFile, runScheme } from './run';
export type { RunSchemeOptions } from './run';
