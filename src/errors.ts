/**
 * Machine-readable identifiers for every fatal condition the harness raises.
 *
 * Grouped by the phase that detects them:
 * - Scheme parsing: `LINE_TOO_LONG`, `INVALID_RETURN_CODE`, `INVALID_ENV_ENTRY`,
 *   `MISSING_FILE_NAME`, `DUPLICATE_FILE`, `DUPLICATE_RETURN_CODE`.
 * - Scheme loading: `SCHEME_FILE_UNREADABLE`.
 * - Fixture setup: `FIXTURE_ALLOCATION_FAILED`, `FIXTURE_PATH_OUTSIDE_ROOT`,
 *   `FIXTURE_DIRECTORY_FAILED`, `FIXTURE_WRITE_FAILED`.
 * - Execution: `PROCESS_START_FAILED`, `PROCESS_IO_FAILED`.
 * - Reporting: `TEST_ABORTED`, `SCHEME_ASSERTION_FAILED`.
 */
export type HarnessErrorCode =
  | 'LINE_TOO_LONG'
  | 'INVALID_RETURN_CODE'
  | 'INVALID_ENV_ENTRY'
  | 'MISSING_FILE_NAME'
  | 'DUPLICATE_FILE'
  | 'DUPLICATE_RETURN_CODE'
  | 'SCHEME_FILE_UNREADABLE'
  | 'FIXTURE_ALLOCATION_FAILED'
  | 'FIXTURE_PATH_OUTSIDE_ROOT'
  | 'FIXTURE_DIRECTORY_FAILED'
  | 'FIXTURE_WRITE_FAILED'
  | 'PROCESS_START_FAILED'
  | 'PROCESS_IO_FAILED'
  | 'TEST_ABORTED'
  | 'SCHEME_ASSERTION_FAILED';

export type HarnessErrorDetails = Record<string, unknown>;

export type HarnessErrorOptions = {
  code: HarnessErrorCode;
  details?: HarnessErrorDetails;
  cause?: unknown;
};

/**
 * Base class for every error the harness raises on purpose.
 *
 * Anything extending this class aborts a single invocation before (or
 * instead of) the assertion phase; the executor converts it into a fatal
 * diagnostic on the test handle. Errors of any other type are bugs and
 * propagate untouched.
 */
export class HarnessError extends Error {
  /** Stable identifier of the failure. */
  public readonly code: HarnessErrorCode;
  /** Context for diagnostics (paths, offending values, line numbers). */
  public readonly details?: HarnessErrorDetails;

  constructor(message: string, options: HarnessErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A scheme line that cannot be interpreted (malformed `--return-code:`,
 * `--env:` without `=`, oversized line, strict-mode duplicates).
 */
export class SchemeSyntaxError extends HarnessError {
  constructor(
    message: string,
    code: Extract<
      HarnessErrorCode,
      | 'LINE_TOO_LONG'
      | 'INVALID_RETURN_CODE'
      | 'INVALID_ENV_ENTRY'
      | 'MISSING_FILE_NAME'
      | 'DUPLICATE_FILE'
      | 'DUPLICATE_RETURN_CODE'
    >,
    details?: HarnessErrorDetails
  ) {
    super(message, { code, details });
  }
}

export class SchemeFileError extends HarnessError {
  constructor(filePath: string, cause: unknown) {
    super(`Failed to read test file ${filePath}: ${describeCause(cause)}`, {
      code: 'SCHEME_FILE_UNREADABLE',
      details: { filePath },
      cause
    });
  }
}

export class FixtureError extends HarnessError {
  constructor(
    message: string,
    code: Extract<
      HarnessErrorCode,
      | 'FIXTURE_ALLOCATION_FAILED'
      | 'FIXTURE_PATH_OUTSIDE_ROOT'
      | 'FIXTURE_DIRECTORY_FAILED'
      | 'FIXTURE_WRITE_FAILED'
    >,
    details?: HarnessErrorDetails,
    cause?: unknown
  ) {
    super(message, { code, details, cause });
  }
}

/**
 * The program under test could not be started at all (binary missing,
 * permission denied), or its standard streams broke for a reason other
 * than the child exiting early.
 *
 * A nonzero exit status is never reported through this class.
 */
export class ProcessStartError extends HarnessError {
  constructor(
    message: string,
    details: HarnessErrorDetails,
    cause?: unknown,
    code: Extract<
      HarnessErrorCode,
      'PROCESS_START_FAILED' | 'PROCESS_IO_FAILED'
    > = 'PROCESS_START_FAILED'
  ) {
    super(message, { code, details, cause });
  }
}

/**
 * Thrown by `TestHandle.fatal` to unwind the current invocation.
 */
export class TestAbortedError extends HarnessError {
  constructor(message: string) {
    super(message, { code: 'TEST_ABORTED' });
  }
}

/**
 * Raised by `runScheme` once a handle has failed, carrying every
 * diagnostic so that the surrounding test runner prints them together.
 */
export class SchemeAssertionError extends HarnessError {
  public readonly diagnostics: readonly string[];

  constructor(testName: string, diagnostics: readonly string[]) {
    super(
      [`Scheme test "${testName}" failed:`, ...diagnostics].join('\n'),
      { code: 'SCHEME_ASSERTION_FAILED', details: { testName } }
    );
    this.diagnostics = diagnostics;
  }
}

/**
 * Renders an unknown thrown value for inclusion in a diagnostic message.
 */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
