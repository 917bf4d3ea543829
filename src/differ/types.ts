/**
 * Shared properties common to all line edit events.
 */
type LineEditBase = {
  /**
   * The line text, including its trailing newline.
   */
  value: string;
};

/**
 * Represents an **extra** line.
 * Occurs when a line is present in the `actual` sequence but has no
 * counterpart in `expected`.
 */
export type DiffCreate = LineEditBase & {
  /**
   * Discriminator literal identifying the type of edit.
   */
  type: 'CREATE';
  /**
   * 1-based position of the line in the `actual` sequence.
   */
  actualLine: number;
};

/**
 * Represents a **missing** line.
 * Occurs when a line is present in `expected` but absent from `actual`.
 */
export type DiffRemove = LineEditBase & {
  /**
   * Discriminator literal identifying the type of edit.
   */
  type: 'REMOVE';
  /**
   * 1-based position of the line in the `expected` sequence.
   */
  expectedLine: number;
};

/**
 * Represents a line common to both sequences.
 * Emitted so that renderers can show context around changes.
 */
export type DiffEqual = LineEditBase & {
  type: 'EQUAL';
  expectedLine: number;
  actualLine: number;
};

/**
 * Union of all operations of an edit script.
 */
export type LineEdit = DiffCreate | DiffRemove | DiffEqual;

export type FormatOptions = {
  /**
   * Number of unchanged lines kept before and after each change.
   * Longer unchanged runs are collapsed into a single marker line.
   * @default 2
   */
  context: number;
};
