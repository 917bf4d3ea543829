import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';

import { SIGNALED_EXIT_CODE } from '../constants';
import { ProcessStartError, describeCause } from '../errors';
import { processLogger as logger } from '../logger';

export type SpawnRequest = {
  program: string;
  args: readonly string[];
  env: Readonly<Record<string, string>>;
  cwd: string;
};

/**
 * A started child process.
 *
 * Every method may be called once; all of them settle after the process
 * has terminated (or failed to start).
 */
export interface SpawnedProcess {
  /** Feeds `data` to standard input and closes it. */
  writeStdin(data: string): Promise<void>;

  /** Resolves with everything written to standard output. */
  readStdout(): Promise<string>;

  /** Resolves with everything written to standard error. */
  readStderr(): Promise<string>;

  /**
   * Resolves with the exit code (`-1` when killed by a signal).
   * Rejects with `ProcessStartError` when the program could not be started.
   */
  wait(): Promise<number>;
}

/**
 * The operating-system process primitive, kept behind an interface so that
 * the execution engine can run against an in-memory double.
 */
export interface ProcessSpawner {
  spawn(request: SpawnRequest): SpawnedProcess;
}

type StreamName = 'stdout' | 'stderr';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * `SpawnedProcess` backed by `node:child_process`.
 *
 * Output listeners are attached at construction time, so nothing written
 * before `readStdout`/`readStderr` is called gets lost.
 */
class NodeSpawnedProcess implements SpawnedProcess {
  private readonly chunks: Record<StreamName, Buffer[]> = {
    stdout: [],
    stderr: []
  };
  private readonly terminated: Promise<number>;
  private started = false;

  constructor(
    private readonly child: ChildProcess,
    private readonly request: SpawnRequest
  ) {
    child.stdout?.on('data', (chunk: Buffer) => this.chunks.stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => this.chunks.stderr.push(chunk));
    child.once('spawn', () => {
      this.started = true;
    });

    this.terminated = new Promise((resolve, reject) => {
      child.on('error', error => {
        if (this.started) {
          logger.warn('Child process reported an error after start', {
            program: request.program,
            error: describeCause(error)
          });
          return;
        }
        reject(
          new ProcessStartError(
            `Failed to start ${JSON.stringify(request.program)}: ${describeCause(error)}`,
            { program: request.program, cwd: request.cwd },
            error
          )
        );
      });
      child.once('close', (code, signal) => {
        logger.debug('Child process exited', {
          program: request.program,
          code,
          signal
        });
        resolve(code ?? SIGNALED_EXIT_CODE);
      });
    });
  }

  writeStdin(data: string): Promise<void> {
    const stdin = this.child.stdin;
    if (!stdin) return Promise.resolve();

    return new Promise((resolve, reject) => {
      stdin.on('error', error => {
        // A child may exit without reading its input, and a child that never
        // started has no input to read; wait() reports the latter.
        if (!this.started || (isErrnoException(error) && error.code === 'EPIPE')) {
          resolve();
          return;
        }
        reject(
          new ProcessStartError(
            `Failed to write stdin of ${JSON.stringify(this.request.program)}: ${describeCause(error)}`,
            { program: this.request.program },
            error,
            'PROCESS_IO_FAILED'
          )
        );
      });
      stdin.once('finish', () => resolve());
      // Destroyed without an error when the program failed to start.
      stdin.once('close', () => resolve());
      stdin.end(data);
    });
  }

  async readStdout(): Promise<string> {
    await this.terminated;
    return Buffer.concat(this.chunks.stdout).toString('utf8');
  }

  async readStderr(): Promise<string> {
    await this.terminated;
    return Buffer.concat(this.chunks.stderr).toString('utf8');
  }

  wait(): Promise<number> {
    return this.terminated;
  }
}

/**
 * Spawns programs with `node:child_process`, without a shell.
 */
export const nodeProcessSpawner: ProcessSpawner = {
  spawn(request) {
    logger.debug('Spawning process', {
      program: request.program,
      args: request.args,
      cwd: request.cwd
    });
    const child = spawn(request.program, [...request.args], {
      cwd: request.cwd,
      env: { ...request.env },
      stdio: ['pipe', 'pipe', 'pipe']
    });
    return new NodeSpawnedProcess(child, request);
  }
};
