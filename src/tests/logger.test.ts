import { describe, expect, test } from 'vitest';

import { createServiceLogger, resolveLogLevel } from '../logger';

describe('resolveLogLevel', () => {
  test.for([
    { id: 'Explicit', input: 'debug', expected: 'debug' },
    { id: 'Unknown Level', input: 'loud', expected: 'warn' },
    { id: 'Unset', input: undefined, expected: 'warn' }
  ])('[$id] $input resolves to $expected', ({ input, expected }) => {
    expect(resolveLogLevel(input)).toBe(expected);
  });
});

describe('createServiceLogger', () => {
  test('uses an explicit level and keeps the console transport active', () => {
    const logger = createServiceLogger('process', 'debug');

    expect(logger.level).toBe('debug');
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0].silent).toBe(false);
  });

  test('tags entries with the service name', () => {
    const logger = createServiceLogger('fixture', 'info');
    expect(logger.defaultMeta).toStrictEqual({ service: 'fixture' });
  });
});
