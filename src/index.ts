export { createExecutor, execute, executeForFile } from './executor';
export type { Executor, ExecutorDependencies } from './executor';

export {
  SchemeTestHandle,
  expectScheme,
  expectSchemeFile,
  runScheme
} from './handle';
export type { RunSchemeOptions } from './handle';

export { withArgs, withCwd, withEnv } from './process';
export type { ProcessSpawner, SpawnRequest, SpawnedProcess } from './process';

export { interpretScheme } from './scheme';
export { compareResults } from './assertions';
export type { AssertionFailure, AssertionReport } from './assertions';
export { diffLines, formatLineDiff } from './differ';
export type { LineEdit } from './differ';

export { createTempDirAllocator } from './fixture';
export type { FixtureAllocator, FixtureFileSystem } from './fixture';

export { loadConfig } from './config';
export type { HarnessConfig } from './config';

export {
  FixtureError,
  HarnessError,
  ProcessStartError,
  SchemeAssertionError,
  SchemeFileError,
  SchemeSyntaxError,
  TestAbortedError
} from './errors';
export type { HarnessErrorCode } from './errors';

export type * from './types';
