import type {
  DiffCreate,
  DiffEqual,
  DiffRemove,
  FormatOptions,
  LineEdit
} from './types';

/**
 * Factory function to create a standardized `CREATE` (extra line) record.
 *
 * @param value - The line found only in the actual sequence.
 * @param actualLine - Its 1-based position in the actual sequence.
 */
export function createCreate(value: string, actualLine: number): DiffCreate {
  return { type: 'CREATE', value, actualLine };
}

/**
 * Factory function to create a standardized `REMOVE` (missing line) record.
 *
 * @param value - The line found only in the expected sequence.
 * @param expectedLine - Its 1-based position in the expected sequence.
 */
export function createRemove(value: string, expectedLine: number): DiffRemove {
  return { type: 'REMOVE', value, expectedLine };
}

export function createEqual(
  value: string,
  expectedLine: number,
  actualLine: number
): DiffEqual {
  return { type: 'EQUAL', value, expectedLine, actualLine };
}

/**
 * `true` when the edit script contains at least one missing or extra line.
 */
export function hasChanges(edits: readonly LineEdit[]): boolean {
  return edits.some(edit => edit.type !== 'EQUAL');
}

/**
 * Merges user-provided rendering options with library defaults.
 *
 * Default Configuration:
 * - `context`: `2` (two unchanged lines around every change).
 *
 * Negative or fractional values are clamped to a non-negative integer.
 */
export function normalizeOptions(
  options: Partial<FormatOptions> = {}
): FormatOptions {
  const context = options.context ?? 2;
  return { context: Math.max(0, Math.floor(context)) };
}
