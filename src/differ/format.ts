import type { FormatOptions, LineEdit } from './types';

import { hasChanges, normalizeOptions } from './utils';

const MARKER = {
  CREATE: '+',
  REMOVE: '-',
  EQUAL: ' '
} as const;

/**
 * 1-based line number shown next to an edit: the output position for an
 * extra line, the expected position otherwise.
 */
function positionOf(edit: LineEdit): number {
  switch (edit.type) {
    case 'CREATE':
      return edit.actualLine;
    case 'REMOVE':
    case 'EQUAL':
      return edit.expectedLine;
  }
}

/**
 * Renders one edit as `<marker><line number> <quoted line>`.
 *
 * Lines are JSON-quoted so that trailing whitespace, carriage returns and
 * the newline itself stay visible.
 */
function renderEdit(edit: LineEdit): string {
  return `${MARKER[edit.type]}${positionOf(edit)} ${JSON.stringify(edit.value)}`;
}

function renderCollapsed(count: number): string {
  return `  ... ${count} identical line${count === 1 ? '' : 's'}`;
}

/**
 * Renders an edit script as a human-readable diff.
 *
 * Layout:
 * - `-12 "line\n"`: line 12 of the expectation, missing from the output
 * - `+14 "line\n"`: line 14 of the output, which was not expected
 * - ` 12 "line\n"`: unchanged context, numbered as in the expectation
 *
 * Only `context` unchanged lines are kept after the previous change and
 * before the next one; anything in between collapses into a single
 * `... N identical lines` marker. Unchanged lines before the first change
 * and after the last one count as a run with a single neighbour.
 *
 * @param edits - An edit script from `diffLines`.
 * @param options - Rendering options (see `FormatOptions`).
 * @returns The rendered diff, or an empty string when nothing changed.
 */
export function formatLineDiff(
  edits: readonly LineEdit[],
  options: Partial<FormatOptions> = {}
): string {
  if (!hasChanges(edits)) return '';

  const { context } = normalizeOptions(options);
  const output: string[] = [];

  let index = 0;
  while (index < edits.length) {
    if (edits[index].type !== 'EQUAL') {
      output.push(renderEdit(edits[index]));
      index++;
      continue;
    }

    let end = index;
    while (end < edits.length && edits[end].type === 'EQUAL') end++;

    const run = edits.slice(index, end);
    const keepHead = index === 0 ? 0 : context;
    const keepTail = end === edits.length ? 0 : context;
    const hidden = run.length - keepHead - keepTail;

    if (hidden <= 0) {
      output.push(...run.map(renderEdit));
    } else {
      output.push(...run.slice(0, keepHead).map(renderEdit));
      output.push(renderCollapsed(hidden));
      output.push(...run.slice(run.length - keepTail).map(renderEdit));
    }

    index = end;
  }

  return output.join('\n');
}
