import fse from 'fs-extra';

import type { HarnessConfig } from './config';
import type { FixtureFileSystem } from './fixture';
import type { ProcessSpawner } from './process';
import type { CommandOption } from './types/execution';
import type { TestHandle } from './types/handle';

import { compareResults, reportAssertions } from './assertions';
import { loadConfig } from './config';
import { HarnessError, SchemeFileError, TestAbortedError } from './errors';
import { materializeFixture, nodeFileSystem } from './fixture';
import { executorLogger as logger } from './logger';
import { nodeProcessSpawner, prepareCommand, runCommand } from './process';
import { interpretScheme } from './scheme';

/**
 * Capabilities the entry points are built on. Every one of them has a
 * Node-backed default; tests replace them with in-memory doubles.
 */
export type ExecutorDependencies = {
  spawner: ProcessSpawner;
  fileSystem: FixtureFileSystem;
  config: HarnessConfig;
  readSchemeFile: (schemePath: string) => Promise<string>;
  /**
   * Environment inherited by the program under test.
   * @default process.env
   */
  ambientEnv: Readonly<Record<string, string | undefined>>;
};

export type Executor = {
  /**
   * Runs `program` as described by `scheme` and reports to `handle`.
   *
   * @returns `true` when every assertion passed. Mismatches are reported
   *   with `handle.error`; setup and execution failures end the invocation
   *   through `handle.fatal`.
   */
  execute: (
    handle: TestHandle,
    program: string,
    scheme: string,
    ...options: CommandOption[]
  ) => Promise<boolean>;

  /**
   * Reads the scheme from `schemePath` (UTF-8), then behaves like `execute`.
   */
  executeForFile: (
    handle: TestHandle,
    program: string,
    schemePath: string,
    ...options: CommandOption[]
  ) => Promise<boolean>;
};

function readUtf8(schemePath: string): Promise<string> {
  return fse.readFile(schemePath, 'utf8');
}

/**
 * Builds `execute`/`executeForFile` on top of the given dependencies.
 *
 * Invocation flow
 * ---------------
 * 1. Allocate:
 *    The fixture root comes from `handle.tempDir()` and is released by the
 *    handle's cleanups.
 * 2. Interpret:
 *    The scheme becomes a test plan; strict-mode warnings are logged to the
 *    handle.
 * 3. Materialize:
 *    Declared files are written under the root.
 * 4. Run:
 *    Command options are applied in order, then the scheme's `--env:`
 *    entries; the program runs to completion.
 * 5. Assert:
 *    Exit code, stdout and stderr are checked independently.
 *
 * A `HarnessError` in steps 1-4 is turned into `handle.fatal`, so nothing
 * is run against a half-prepared fixture. When the test has failed by the
 * time its cleanups run, the full scheme text is logged.
 */
export function createExecutor(
  dependencies: Partial<ExecutorDependencies> = {}
): Executor {
  const {
    spawner = nodeProcessSpawner,
    fileSystem = nodeFileSystem,
    config = loadConfig(),
    readSchemeFile = readUtf8,
    ambientEnv = process.env
  } = dependencies;

  const execute: Executor['execute'] = async (
    handle,
    program,
    scheme,
    ...options
  ) => {
    handle.cleanup(() => {
      if (handle.failed()) handle.log(`Test scheme: ${scheme}`);
    });

    try {
      const rootDir = await handle.tempDir();

      const { plan, warnings } = interpretScheme(scheme, rootDir, {
        strict: config.strict,
        maxLineBytes: config.maxLineBytes
      });
      for (const warning of warnings) handle.log(warning);

      await materializeFixture(rootDir, plan.files, fileSystem);

      const command = prepareCommand(program, plan, options, ambientEnv);
      const result = await runCommand(command, spawner);

      return reportAssertions(handle, compareResults(plan, result));
    } catch (error) {
      if (error instanceof HarnessError && !(error instanceof TestAbortedError)) {
        logger.debug('Invocation aborted', {
          test: handle.name,
          code: error.code,
          details: error.details
        });
        return handle.fatal(error.message);
      }
      throw error;
    }
  };

  const executeForFile: Executor['executeForFile'] = async (
    handle,
    program,
    schemePath,
    ...options
  ) => {
    let scheme: string;
    try {
      scheme = await readSchemeFile(schemePath);
    } catch (error) {
      return handle.fatal(new SchemeFileError(schemePath, error).message);
    }
    return execute(handle, program, scheme, ...options);
  };

  return { execute, executeForFile };
}

const defaultExecutor = createExecutor();

export const execute = defaultExecutor.execute;
export const executeForFile = defaultExecutor.executeForFile;
