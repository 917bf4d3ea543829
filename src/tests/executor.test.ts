import { describe, expect, test } from 'vitest';

import type { FakeBehavior } from '../process/tests/fake-spawner';
import type { HarnessConfig } from '../config';
import { ProcessStartError } from '../errors';
import { createExecutor } from '../executor';
import { loadConfig } from '../config';
import { MemfsFixtureFileSystem } from '../fixture/tests/memfs-file-system';
import { createRecordingAllocator } from '../handle/tests/recording-allocator';
import { runScheme } from '../handle/run';
import { withArgs, withEnv } from '../process/command';
import { FakeProcessSpawner } from '../process/tests/fake-spawner';

const ROOT = '/virtual/root-1';

function setup(behavior?: FakeBehavior, config: Partial<HarnessConfig> = {}) {
  const spawner = new FakeProcessSpawner(behavior);
  const fileSystem = new MemfsFixtureFileSystem();
  const { allocator, events } = createRecordingAllocator();
  const executor = createExecutor({
    spawner,
    fileSystem,
    config: loadConfig({}, config),
    ambientEnv: { PATH: '/usr/bin', UNSET: undefined },
    readSchemeFile: async schemePath => {
      if (schemePath === '/schemes/echo.scheme') return '--stdin\nping\n--stdout\nping\n';
      throw new Error(`ENOENT: no such file or directory, open '${schemePath}'`);
    }
  });

  return { spawner, fileSystem, allocator, events, executor };
}

const echoStdin: FakeBehavior = (_request, stdin) => ({ stdout: stdin });

describe('createExecutor: invocation flow', () => {
  test('materializes, spawns and asserts against one fixture root', async () => {
    const { spawner, fileSystem, allocator, events, executor } = setup(echoStdin);
    const text = [
      '--file:data/a.txt',
      'root is {dir}',
      '--arg:{dir}/data/a.txt',
      '--env:HOME={dir}',
      '--stdin',
      'hello',
      '--stdout',
      'hello'
    ].join('\n');

    const outcome = await runScheme(
      'flow',
      handle => executor.execute(handle, 'tool', text),
      { allocator }
    );

    expect(outcome).toStrictEqual({ passed: true, diagnostics: [] });
    expect(fileSystem.read(`${ROOT}/data/a.txt`)).toBe(`root is ${ROOT}\n`);
    expect(spawner.requests).toStrictEqual([
      {
        program: 'tool',
        args: [`${ROOT}/data/a.txt`],
        env: { PATH: '/usr/bin', HOME: ROOT },
        cwd: ROOT
      }
    ]);
    expect(events).toStrictEqual([`allocate ${ROOT}`, `release ${ROOT}`]);
  });

  test('resolves to the assertion verdict', async () => {
    const { allocator, executor } = setup(() => ({ exitCode: 1 }));
    const verdicts: boolean[] = [];

    await expect(
      runScheme(
        'verdict',
        async handle => {
          verdicts.push(await executor.execute(handle, 'tool', ''));
        },
        { allocator }
      )
    ).rejects.toMatchObject({
      diagnostics: ['[error] Failed to match return code: want 0, got 1', 'Test scheme: ']
    });
    expect(verdicts).toStrictEqual([false]);
  });

  test('applies options before the scheme environment', async () => {
    const { spawner, allocator, executor } = setup();

    await runScheme(
      'options',
      handle =>
        executor.execute(
          handle,
          'tool',
          '--env:A=scheme\n--arg:first',
          withEnv({ A: 'option', B: 'option' }),
          withArgs('second')
        ),
      { allocator }
    );

    expect(spawner.requests[0]).toMatchObject({
      args: ['first', 'second'],
      env: { PATH: '/usr/bin', A: 'scheme', B: 'option' }
    });
  });
});

describe('createExecutor: fatal setup errors', () => {
  test('a malformed scheme never reaches the spawner', async () => {
    const { spawner, allocator, events, executor } = setup();

    await expect(
      runScheme('malformed', handle => executor.execute(handle, 'tool', '--env:BROKEN'), {
        allocator
      })
    ).rejects.toMatchObject({
      diagnostics: [
        '[fatal] Malformed --env entry "BROKEN", expected KEY=VALUE (line 1)',
        'Test scheme: --env:BROKEN'
      ]
    });
    expect(spawner.requests).toStrictEqual([]);
    expect(events).toStrictEqual([`allocate ${ROOT}`, `release ${ROOT}`]);
  });

  test('a file outside the root never reaches the spawner', async () => {
    const { spawner, allocator, executor } = setup();

    await expect(
      runScheme('escape', handle => executor.execute(handle, 'tool', '--file:../x'), {
        allocator
      })
    ).rejects.toMatchObject({
      diagnostics: [
        '[fatal] Fixture file "../x" resolves outside the fixture root',
        'Test scheme: --file:../x'
      ]
    });
    expect(spawner.requests).toStrictEqual([]);
  });

  test('a start failure is fatal', async () => {
    const { allocator, executor } = setup(() => {
      throw new ProcessStartError('Failed to start "tool": not found', { program: 'tool' });
    });

    await expect(
      runScheme('start', handle => executor.execute(handle, 'tool', ''), { allocator })
    ).rejects.toMatchObject({
      diagnostics: ['[fatal] Failed to start "tool": not found', 'Test scheme: ']
    });
  });

  test('errors that are not harness errors propagate unchanged', async () => {
    const bug = new RangeError('unexpected');
    const { allocator, events, executor } = setup(() => {
      throw bug;
    });

    await expect(
      runScheme('bug', handle => executor.execute(handle, 'tool', ''), { allocator })
    ).rejects.toBe(bug);
    expect(events).toStrictEqual([`allocate ${ROOT}`, `release ${ROOT}`]);
  });
});

describe('createExecutor: strict mode', () => {
  test('logs unknown directives as warnings', async () => {
    const { allocator, executor } = setup(undefined, { strict: true });

    await expect(
      runScheme('strict', handle => executor.execute(handle, 'tool', '--note: hi'), {
        allocator
      })
    ).resolves.toStrictEqual({
      passed: true,
      diagnostics: [{ level: 'log', message: 'Ignoring unknown directive "--note: hi" (line 1)' }]
    });
  });

  test('rejects duplicates', async () => {
    const { allocator, executor } = setup(undefined, { strict: true });

    await expect(
      runScheme(
        'duplicates',
        handle => executor.execute(handle, 'tool', '--file:a\n--file:a'),
        { allocator }
      )
    ).rejects.toMatchObject({
      diagnostics: [
        '[fatal] File "a" is declared more than once (line 2)',
        'Test scheme: --file:a\n--file:a'
      ]
    });
  });
});

describe('createExecutor: executeForFile', () => {
  test('runs the scheme read from the file', async () => {
    const { allocator, executor } = setup(echoStdin);

    await expect(
      runScheme(
        'file',
        handle => executor.executeForFile(handle, 'tool', '/schemes/echo.scheme'),
        { allocator }
      )
    ).resolves.toStrictEqual({ passed: true, diagnostics: [] });
  });

  test('an unreadable file is fatal before any allocation', async () => {
    const { spawner, allocator, events, executor } = setup();

    await expect(
      runScheme(
        'missing file',
        handle => executor.executeForFile(handle, 'tool', '/schemes/missing.scheme'),
        { allocator }
      )
    ).rejects.toMatchObject({
      diagnostics: [
        "[fatal] Failed to read test file /schemes/missing.scheme: ENOENT: no such file or directory, open '/schemes/missing.scheme'"
      ]
    });
    expect(spawner.requests).toStrictEqual([]);
    expect(events).toStrictEqual([]);
  });
});
