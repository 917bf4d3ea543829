import { DIRECTIVE_MARKER, DirectivePrefix } from '../constants';

/**
 * A recognized directive line, with its raw (untrimmed) argument.
 *
 * - `open-block`: switches to the stdout, stderr or stdin block.
 * - `open-file`: starts a new file block; `name` is the text after the prefix.
 * - `return-code`, `arg`, `env`: scalar directives that keep the current block.
 * - `unknown`: starts with the directive marker but matches nothing above.
 */
export type Directive =
  | { kind: 'open-block'; block: 'stdout' | 'stderr' | 'stdin' }
  | { kind: 'open-file'; name: string }
  | { kind: 'return-code'; value: string }
  | { kind: 'arg'; value: string }
  | { kind: 'env'; value: string }
  | { kind: 'unknown'; text: string };

type DirectiveRecognizer = {
  prefix: string;
  build: (rest: string, line: string) => Directive;
};

/**
 * Directive recognizers in priority order; the first matching prefix wins.
 *
 * The block markers are plain prefixes: `--stdout` also matches
 * `--stdout-extra`. The generic marker is last, turning any other
 * `--`-prefixed line into an ignorable `unknown` directive.
 */
const RECOGNIZERS: readonly DirectiveRecognizer[] = [
  {
    prefix: DirectivePrefix.Stderr,
    build: () => ({ kind: 'open-block', block: 'stderr' })
  },
  {
    prefix: DirectivePrefix.Stdout,
    build: () => ({ kind: 'open-block', block: 'stdout' })
  },
  {
    prefix: DirectivePrefix.File,
    build: rest => ({ kind: 'open-file', name: rest })
  },
  {
    prefix: DirectivePrefix.Stdin,
    build: () => ({ kind: 'open-block', block: 'stdin' })
  },
  {
    prefix: DirectivePrefix.ReturnCode,
    build: rest => ({ kind: 'return-code', value: rest })
  },
  {
    prefix: DirectivePrefix.Arg,
    build: rest => ({ kind: 'arg', value: rest })
  },
  {
    prefix: DirectivePrefix.Env,
    build: rest => ({ kind: 'env', value: rest })
  },
  {
    prefix: DIRECTIVE_MARKER,
    build: (_rest, line) => ({ kind: 'unknown', text: line.trimEnd() })
  }
];

/**
 * Classifies a segmented line.
 *
 * @param line - A line as produced by `toLines` (with its trailing `\n`).
 * @returns The directive, or `null` when the line is payload.
 */
export function recognizeDirective(line: string): Directive | null {
  for (const { prefix, build } of RECOGNIZERS) {
    if (line.startsWith(prefix)) {
      return build(line.slice(prefix.length), line);
    }
  }
  return null;
}
