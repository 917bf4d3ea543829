import { describe, expect, test } from 'vitest';

import type { CommandDescriptor } from '../../types/execution';
import { ProcessStartError } from '../../errors';
import { snapshotEnvironment } from '../command';
import { runCommand } from '../engine';
import { nodeProcessSpawner } from '../spawner';

function shell(script: string, overrides: Partial<CommandDescriptor> = {}): CommandDescriptor {
  return {
    program: 'sh',
    args: ['-c', script],
    cwd: '/',
    env: snapshotEnvironment(process.env),
    stdin: '',
    ...overrides
  };
}

describe('nodeProcessSpawner: real processes', () => {
  test('captures stdout, stderr and the exit code', async () => {
    await expect(
      runCommand(shell('printf out; printf err >&2; exit 3'), nodeProcessSpawner)
    ).resolves.toStrictEqual({ stdout: 'out', stderr: 'err', exitCode: 3 });
  });

  test('feeds stdin', async () => {
    const result = await runCommand(
      { ...shell(''), program: 'cat', args: [], stdin: 'a\nb\n' },
      nodeProcessSpawner
    );
    expect(result).toStrictEqual({ stdout: 'a\nb\n', stderr: '', exitCode: 0 });
  });

  test('runs in the requested directory with the requested environment', async () => {
    const result = await runCommand(
      shell('pwd; printf "%s\\n" "$GREETING"', {
        cwd: '/',
        env: { ...snapshotEnvironment(process.env), GREETING: 'hello there' }
      }),
      nodeProcessSpawner
    );
    expect(result.stdout).toBe('/\nhello there\n');
  });

  test('tolerates a child that exits without reading stdin', async () => {
    const result = await runCommand(
      shell('exit 0', { stdin: 'x'.repeat(1 << 20) }),
      nodeProcessSpawner
    );
    expect(result.exitCode).toBe(0);
  });

  test('reports -1 for a child killed by a signal', async () => {
    const result = await runCommand(shell('kill -TERM $$'), nodeProcessSpawner);
    expect(result.exitCode).toBe(-1);
  });

  test('rejects when the program does not exist', async () => {
    const failure = runCommand(
      { ...shell(''), program: '/nonexistent/exec-scheme-missing', args: [] },
      nodeProcessSpawner
    );

    await expect(failure).rejects.toBeInstanceOf(ProcessStartError);
    await expect(failure).rejects.toMatchObject({
      code: 'PROCESS_START_FAILED',
      message: expect.stringMatching(/^Failed to start "\/nonexistent\/exec-scheme-missing": /)
    });
  });
});
