import { basename } from 'node:path';

import type { FixtureAllocator } from '../fixture';
import type { CommandOption } from '../types/execution';
import type { Diagnostic, TestHandle, TestOutcome } from '../types/handle';

import { SchemeAssertionError, TestAbortedError } from '../errors';
import { execute, executeForFile } from '../executor';
import { SchemeTestHandle } from './scheme-handle';

export type RunSchemeOptions = {
  allocator?: FixtureAllocator;
};

function formatDiagnostic({ level, message }: Diagnostic): string {
  return level === 'log' ? message : `[${level}] ${message}`;
}

/**
 * Runs `body` against a fresh `SchemeTestHandle` and finishes it.
 *
 * An abort through `handle.fatal` ends the body early and is reported like
 * any other failure. Any other exception still runs the cleanups and is
 * rethrown unchanged.
 *
 * @returns The outcome of a passing test.
 * @throws SchemeAssertionError listing every diagnostic when the handle
 *   failed, so the surrounding test runner reports them.
 */
export async function runScheme(
  name: string,
  body: (handle: TestHandle) => Promise<unknown>,
  options: RunSchemeOptions = {}
): Promise<TestOutcome> {
  const handle = new SchemeTestHandle(name, options.allocator);

  try {
    await body(handle);
  } catch (error) {
    if (!(error instanceof TestAbortedError)) {
      await handle.finish();
      throw error;
    }
  }

  const outcome = await handle.finish();
  if (!outcome.passed) {
    throw new SchemeAssertionError(name, outcome.diagnostics.map(formatDiagnostic));
  }
  return outcome;
}

/**
 * Asserts that `program` behaves as `scheme` describes.
 *
 * @example
 * ```ts
 * test('lists the fixture', async () => {
 *   await expectScheme('ls', ['--file:a.txt', '--stdout', 'a.txt'].join('\n'));
 * });
 * ```
 */
export function expectScheme(
  program: string,
  scheme: string,
  ...options: CommandOption[]
): Promise<TestOutcome> {
  return runScheme(basename(program), handle =>
    execute(handle, program, scheme, ...options)
  );
}

/**
 * Like `expectScheme`, with the scheme read from `schemePath`.
 */
export function expectSchemeFile(
  program: string,
  schemePath: string,
  ...options: CommandOption[]
): Promise<TestOutcome> {
  return runScheme(basename(schemePath), handle =>
    executeForFile(handle, program, schemePath, ...options)
  );
}
