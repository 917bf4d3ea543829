import type { TestHandle } from '../types/handle';
import type { AssertionReport } from './compare';

import { assertionLogger as logger } from '../logger';

/**
 * Forwards an assertion report to the test handle.
 *
 * Every failure becomes a non-fatal error, so all mismatches of one run are
 * reported together. A stream mismatch is followed by the complete captured
 * stream (`stdout:\n...`), which the diff alone may abbreviate.
 *
 * @returns `report.passed`, for chaining into the executor's result.
 */
export function reportAssertions(
  handle: TestHandle,
  report: AssertionReport
): boolean {
  for (const failure of report.failures) {
    handle.error(failure.message);
    if (failure.field !== 'return-code') {
      handle.log(`${failure.field}:\n${failure.actual}`);
    }
  }

  if (!report.passed) {
    logger.debug('Assertions failed', {
      test: handle.name,
      fields: report.failures.map(failure => failure.field)
    });
  }

  return report.passed;
}
