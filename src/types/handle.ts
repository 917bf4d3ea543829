/**
 * The slice of a host test runner the harness talks to.
 *
 * Mirrors the usual "test context" contract: diagnostics, soft and hard
 * failures, deferred cleanup, and an exclusive scratch directory.
 */
export interface TestHandle {
  readonly name: string;

  /** Records an informational diagnostic. */
  log(message: string): void;

  /** Records a failure and lets the invocation continue. */
  error(message: string): void;

  /** Records a failure and aborts the invocation by throwing. */
  fatal(message: string): never;

  failed(): boolean;

  /**
   * Registers a function to run when the test finishes.
   * Cleanups run in reverse registration order.
   */
  cleanup(fn: () => void | Promise<void>): void;

  /**
   * Returns a fresh, empty, absolute directory owned by this test and
   * removed when its cleanups run.
   */
  tempDir(): Promise<string>;
}

export type DiagnosticLevel = 'log' | 'error' | 'fatal';

export type Diagnostic = {
  level: DiagnosticLevel;
  message: string;
};

/**
 * Final state of a standalone handle once its cleanups have run.
 */
export type TestOutcome = {
  passed: boolean;
  diagnostics: Diagnostic[];
};
