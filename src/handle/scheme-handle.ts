import type { FixtureAllocator } from '../fixture';
import type {
  Diagnostic,
  DiagnosticLevel,
  TestHandle,
  TestOutcome
} from '../types/handle';

import { TestAbortedError, describeCause } from '../errors';
import { tempDirAllocator } from '../fixture';

type Cleanup = () => void | Promise<void>;

/**
 * Standalone `TestHandle`, independent of any test runner.
 *
 * Diagnostics are recorded in order; `finish()` runs the registered
 * cleanups (last registered first) and reports the outcome. A handle is
 * meant for a single test and cannot be reused after `finish()`.
 */
export class SchemeTestHandle implements TestHandle {
  private readonly diagnostics: Diagnostic[] = [];
  private readonly cleanups: Cleanup[] = [];
  private hasFailed = false;
  private finished = false;

  constructor(
    public readonly name: string,
    private readonly allocator: FixtureAllocator = tempDirAllocator
  ) {}

  log(message: string): void {
    this.record('log', message);
  }

  error(message: string): void {
    this.record('error', message);
    this.hasFailed = true;
  }

  fatal(message: string): never {
    this.record('fatal', message);
    this.hasFailed = true;
    throw new TestAbortedError(message);
  }

  failed(): boolean {
    return this.hasFailed;
  }

  cleanup(fn: Cleanup): void {
    if (this.finished) {
      throw new Error(`Test handle "${this.name}" has already finished`);
    }
    this.cleanups.push(fn);
  }

  async tempDir(): Promise<string> {
    const dir = await this.allocator.allocate();
    this.cleanup(() => this.allocator.release(dir));
    return dir;
  }

  /**
   * Runs every cleanup, newest first, and returns the outcome.
   *
   * A failing cleanup is recorded as an error and does not stop the
   * remaining ones.
   */
  async finish(): Promise<TestOutcome> {
    this.finished = true;

    let cleanup = this.cleanups.pop();
    while (cleanup) {
      try {
        await cleanup();
      } catch (error) {
        this.error(`Cleanup failed: ${describeCause(error)}`);
      }
      cleanup = this.cleanups.pop();
    }

    return { passed: !this.hasFailed, diagnostics: [...this.diagnostics] };
  }

  private record(level: DiagnosticLevel, message: string): void {
    this.diagnostics.push({ level, message });
  }
}
