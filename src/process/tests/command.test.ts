import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import type { CommandDescriptor } from '../../types/execution';
import type { TestPlan } from '../../types/plan';
import {
  applyEnvironmentOverlay,
  createCommandDescriptor,
  prepareCommand,
  withArgs,
  withCwd,
  withEnv
} from '../command';

const AMBIENT = { PATH: '/usr/bin:/bin', HOME: '/home/tester', UNSET: undefined };

function plan(overrides: Partial<TestPlan> = {}): TestPlan {
  return {
    rootDir: '/fixture',
    files: new Map(),
    args: ['-a'],
    env: [],
    stdin: 'input\n',
    stdoutExpected: '',
    stderrExpected: '',
    returnCodeExpected: 0,
    ...overrides
  };
}

describe('createCommandDescriptor', () => {
  test('starts from the plan and the defined ambient variables', () => {
    expect(createCommandDescriptor('ls', plan(), AMBIENT)).toStrictEqual({
      program: 'ls',
      args: ['-a'],
      cwd: '/fixture',
      env: { PATH: '/usr/bin:/bin', HOME: '/home/tester' },
      stdin: 'input\n'
    });
  });

  test('copies the plan arguments', () => {
    const source = plan();
    const command = createCommandDescriptor('ls', source, AMBIENT);
    command.args.push('-l');
    expect(source.args).toStrictEqual(['-a']);
  });

  test('does not apply the plan environment', () => {
    const command = createCommandDescriptor('ls', plan({ env: ['A=1'] }), {});
    expect(command.env).toStrictEqual({});
  });
});

describe('applyEnvironmentOverlay', () => {
  const scenarios: Array<
    TestScenario<{ base: Record<string, string>; entries: string[] }, Record<string, string>>
  > = [
    {
      id: 'Add',
      description: 'New keys are added.',
      input: { base: {}, entries: ['A=1'] },
      expected: { A: '1' }
    },
    {
      id: 'Override',
      description: 'Existing keys are replaced.',
      input: { base: { HOME: '/home/tester' }, entries: ['HOME=/fixture'] },
      expected: { HOME: '/fixture' }
    },
    {
      id: 'First Equals Sign',
      description: 'The value keeps any further equals signs.',
      input: { base: {}, entries: ['OPTS=a=b=c'] },
      expected: { OPTS: 'a=b=c' }
    },
    {
      id: 'Empty Value',
      description: 'An empty value is set, not removed.',
      input: { base: { A: 'x' }, entries: ['A='] },
      expected: { A: '' }
    },
    {
      id: 'Later Wins',
      description: 'Entries are applied in order.',
      input: { base: {}, entries: ['A=1', 'B=2', 'A=3'] },
      expected: { A: '3', B: '2' }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const command: CommandDescriptor = {
      program: 'p',
      args: [],
      cwd: '/',
      env: { ...input.base },
      stdin: ''
    };
    applyEnvironmentOverlay(command, input.entries);
    expect(command.env).toStrictEqual(expected);
  });
});

describe('prepareCommand: options then scheme environment', () => {
  test('applies the helpers in order', () => {
    const command = prepareCommand(
      'ls',
      plan(),
      [withArgs('-l', '-h'), withCwd('/elsewhere'), withEnv({ LC_ALL: 'C' })],
      AMBIENT
    );

    expect(command).toStrictEqual({
      program: 'ls',
      args: ['-a', '-l', '-h'],
      cwd: '/elsewhere',
      env: { PATH: '/usr/bin:/bin', HOME: '/home/tester', LC_ALL: 'C' },
      stdin: 'input\n'
    });
  });

  test('lets a later option override an earlier one', () => {
    const command = prepareCommand(
      'ls',
      plan(),
      [withEnv({ A: '1' }), withEnv({ A: '2' })],
      {}
    );
    expect(command.env).toStrictEqual({ A: '2' });
  });

  test('layers scheme entries over the option environment', () => {
    const command = prepareCommand(
      'ls',
      plan({ env: ['A=scheme'] }),
      [withEnv({ A: 'option', B: 'option' })],
      {}
    );
    expect(command.env).toStrictEqual({ A: 'scheme', B: 'option' });
  });

  test('keeps scheme entries when an option replaces the environment', () => {
    const command = prepareCommand(
      'ls',
      plan({ env: ['ONLY=this'] }),
      [
        descriptor => {
          descriptor.env = {};
        }
      ],
      AMBIENT
    );
    expect(command.env).toStrictEqual({ ONLY: 'this' });
  });
});
