/**
 * Common prefix of every directive. A line starting with it that matches
 * none of the known directives is ignored.
 */
export const DIRECTIVE_MARKER = '--';

/**
 * Directive prefixes of the scheme language.
 */
export const DirectivePrefix = {
  File: '--file:',
  Stdout: '--stdout',
  Stderr: '--stderr',
  Stdin: '--stdin',
  Env: '--env:',
  Arg: '--arg:',
  ReturnCode: '--return-code:'
} as const;

/**
 * Placeholder expanded to the absolute fixture root.
 */
export const ROOT_DIR_PLACEHOLDER = '{dir}';

export const DEFAULT_RETURN_CODE = 0;

/**
 * Exit code reported when the child was terminated by a signal.
 */
export const SIGNALED_EXIT_CODE = -1;
