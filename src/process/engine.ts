import type { CommandDescriptor, ExecutionResult } from '../types/execution';
import type { ProcessSpawner } from './spawner';

import { processLogger as logger } from '../logger';
import { nodeProcessSpawner } from './spawner';

/**
 * Runs a command to completion and captures what it produced.
 *
 * Stdin is written and both output streams are drained concurrently with
 * the wait for termination, so a child filling a pipe buffer cannot
 * deadlock against the harness. There is no timeout: a child that never
 * exits keeps this promise pending.
 *
 * @param command - The prepared descriptor (see `prepareCommand`).
 * @param spawner - Process primitive to use.
 * @returns Captured stdout, stderr and exit code. A nonzero exit code is a
 *   regular result.
 * @throws ProcessStartError when the program could not be started.
 */
export async function runCommand(
  command: CommandDescriptor,
  spawner: ProcessSpawner = nodeProcessSpawner
): Promise<ExecutionResult> {
  const child = spawner.spawn({
    program: command.program,
    args: command.args,
    env: command.env,
    cwd: command.cwd
  });

  const [exitCode, stdout, stderr] = await Promise.all([
    child.wait(),
    child.readStdout(),
    child.readStderr(),
    child.writeStdin(command.stdin)
  ]);

  logger.debug('Command finished', {
    program: command.program,
    exitCode,
    stdoutBytes: Buffer.byteLength(stdout, 'utf8'),
    stderrBytes: Buffer.byteLength(stderr, 'utf8')
  });

  return { stdout, stderr, exitCode };
}
