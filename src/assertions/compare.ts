import type { ExecutionResult } from '../types/execution';
import type { TestPlan } from '../types/plan';

import { diffLines, formatLineDiff, hasChanges } from '../differ';
import { toLines } from '../scheme';

/**
 * The parts of a plan the assertion engine checks.
 */
export type AssertionExpectation = Pick<
  TestPlan,
  'stdoutExpected' | 'stderrExpected' | 'returnCodeExpected'
>;

export type StreamName = 'stdout' | 'stderr';

export type ReturnCodeFailure = {
  field: 'return-code';
  message: string;
  expected: number;
  actual: number;
};

export type StreamFailure = {
  field: StreamName;
  message: string;
  /**
   * The complete captured stream, logged alongside the diff.
   */
  actual: string;
};

export type AssertionFailure = ReturnCodeFailure | StreamFailure;

export type AssertionReport = {
  passed: boolean;
  failures: AssertionFailure[];
};

/**
 * Captured output is compared regardless of line length; the segmenter's
 * ceiling only guards scheme input.
 */
const UNBOUNDED = { maxLineBytes: Number.POSITIVE_INFINITY };

export function compareReturnCode(
  expected: number,
  actual: number
): ReturnCodeFailure | undefined {
  if (expected === actual) return undefined;
  return {
    field: 'return-code',
    message: `Failed to match return code: want ${expected}, got ${actual}`,
    expected,
    actual
  };
}

/**
 * Compares one output stream line by line.
 *
 * Both sides are segmented the same way, so a missing final newline on
 * either side is not a difference, while trailing whitespace and empty
 * lines are.
 */
export function compareStream(
  name: StreamName,
  expected: string,
  actual: string
): StreamFailure | undefined {
  const edits = diffLines(toLines(expected, UNBOUNDED), toLines(actual, UNBOUNDED));
  if (!hasChanges(edits)) return undefined;

  return {
    field: name,
    message: `Failed matching ${name} (-missing line, +extra line):\n${formatLineDiff(edits)}`,
    actual
  };
}

/**
 * Runs the three independent checks of an invocation.
 *
 * Order of failures: exit code, stdout, stderr. One check failing never
 * suppresses another.
 */
export function compareResults(
  expectation: AssertionExpectation,
  result: ExecutionResult
): AssertionReport {
  const failures = [
    compareReturnCode(expectation.returnCodeExpected, result.exitCode),
    compareStream('stdout', expectation.stdoutExpected, result.stdout),
    compareStream('stderr', expectation.stderrExpected, result.stderr)
  ].filter((failure): failure is AssertionFailure => failure !== undefined);

  return { passed: failures.length === 0, failures };
}
