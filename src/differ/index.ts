import type { LineEdit } from './types';

import { createCreate, createEqual, createRemove } from './utils';

/**
 * Furthest-reaching x coordinate per diagonal, one snapshot per edit
 * distance `d` (taken before round `d` runs).
 */
type Trace = Int32Array[];

/**
 * Explores the edit graph of `expected` (x axis) against `actual` (y axis)
 * breadth-first by edit distance, recording the furthest point reached on
 * every diagonal `k = x - y`.
 *
 * Logic:
 * 1. Step:
 *    For each distance `d`, each diagonal is reached either by a move down
 *    (an extra line, from diagonal `k + 1`) or a move right (a missing
 *    line, from diagonal `k - 1`), whichever got further.
 * 2. Snake:
 *    From that point, equal lines are followed diagonally for free.
 * 3. Stop:
 *    As soon as one diagonal reaches the bottom-right corner, `d` is the
 *    length of the shortest edit script and the snapshots are returned.
 *
 * @param expected - Lines that should have been produced.
 * @param actual - Lines that were produced.
 * @param offset - Shift applied to diagonals so that indices stay positive.
 * @returns One snapshot of the furthest points per explored distance.
 */
function traceFurthestPaths(
  expected: readonly string[],
  actual: readonly string[],
  offset: number
): Trace {
  const n = expected.length;
  const m = actual.length;
  const max = n + m;
  const furthest = new Int32Array(2 * max + 3);
  const trace: Trace = [];

  for (let d = 0; d <= max; d++) {
    trace.push(furthest.slice());

    for (let k = -d; k <= d; k += 2) {
      const goDown =
        k === -d ||
        (k !== d && furthest[offset + k - 1] < furthest[offset + k + 1]);

      let x = goDown ? furthest[offset + k + 1] : furthest[offset + k - 1] + 1;
      let y = x - k;

      while (x < n && y < m && expected[x] === actual[y]) {
        x++;
        y++;
      }

      furthest[offset + k] = x;

      if (x >= n && y >= m) return trace;
    }
  }

  return trace;
}

/**
 * Walks the recorded snapshots from the bottom-right corner back to the
 * origin and turns every move into an edit.
 *
 * The walk is performed backwards, so edits are collected in reverse and
 * flipped once at the end.
 */
function backtrack(
  trace: Trace,
  expected: readonly string[],
  actual: readonly string[],
  offset: number
): LineEdit[] {
  const edits: LineEdit[] = [];
  let x = expected.length;
  let y = actual.length;

  for (let d = trace.length - 1; d >= 0; d--) {
    const furthest = trace[d];
    const k = x - y;

    const cameDown =
      k === -d ||
      (k !== d && furthest[offset + k - 1] < furthest[offset + k + 1]);

    const previousK = cameDown ? k + 1 : k - 1;
    const previousX = furthest[offset + previousK];
    const previousY = previousX - previousK;

    // Diagonal run of equal lines leading to (x, y).
    while (x > previousX && y > previousY) {
      x--;
      y--;
      edits.push(createEqual(expected[x], x + 1, y + 1));
    }

    if (d > 0) {
      if (cameDown) {
        y--;
        edits.push(createCreate(actual[y], y + 1));
      } else {
        x--;
        edits.push(createRemove(expected[x], x + 1));
      }
    }

    x = previousX;
    y = previousY;
  }

  return edits.reverse();
}

/**
 * Computes a shortest edit script turning `expected` into `actual`.
 *
 * The result lists every line of both inputs exactly once, in order:
 * - `EQUAL`: present in both (with both positions),
 * - `REMOVE`: expected but missing from `actual`,
 * - `CREATE`: present in `actual` but not expected.
 *
 * When a line is replaced, its `REMOVE` precedes the `CREATE` of the
 * replacement. Lines are compared with strict string equality, so a
 * difference in trailing whitespace counts.
 *
 * Runs in O((N + M) · D) time, where D is the number of changed lines; for
 * matching output (D = 0) this is a single linear scan.
 *
 * @param expected - The expected line sequence.
 * @param actual - The produced line sequence.
 * @returns The edit script; it contains no `CREATE`/`REMOVE` iff the inputs are equal.
 */
export function diffLines(
  expected: readonly string[],
  actual: readonly string[]
): LineEdit[] {
  const offset = expected.length + actual.length + 1;
  const trace = traceFurthestPaths(expected, actual, offset);
  return backtrack(trace, expected, actual, offset);
}

export { formatLineDiff } from './format';
export { hasChanges } from './utils';
export type {
  DiffCreate,
  DiffEqual,
  DiffRemove,
  FormatOptions,
  LineEdit
} from './types';
