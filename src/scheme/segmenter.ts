import { DEFAULT_MAX_LINE_BYTES } from '../config';
import { SchemeSyntaxError } from '../errors';

export type SegmentOptions = {
  /**
   * Largest accepted line, in UTF-8 bytes, excluding the terminator.
   * @default 1 MiB
   */
  maxLineBytes?: number;
};

/**
 * Splits text into lines, each ending in exactly one `\n`.
 *
 * Normalization rules:
 * 1. Terminators:
 *    Every produced line ends with `\n`, including the last one when the
 *    input lacks a final newline, and including empty lines.
 * 2. Carriage returns:
 *    A `\r` directly before the line break (or at the very end of input) is
 *    dropped, so CRLF sources behave like LF sources.
 * 3. Trailing remainder:
 *    Nothing is produced for empty input, nor for the empty remainder after
 *    a final `\n` (`"a\n"` yields `["a\n"]`, not `["a\n", "\n"]`).
 *
 * Concatenating the result therefore reproduces any LF-terminated input
 * byte for byte, which is what block reconstruction (file bodies, expected
 * output) relies on.
 *
 * @throws SchemeSyntaxError (`LINE_TOO_LONG`) when a line exceeds
 *   `maxLineBytes`. Oversized lines are rejected, never truncated.
 */
export function toLines(text: string, options: SegmentOptions = {}): string[] {
  const maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
  const lines: string[] = [];

  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf('\n', start);
    const end = newline === -1 ? text.length : newline;

    let line = text.slice(start, end);
    if (line.endsWith('\r')) line = line.slice(0, -1);

    const size = Buffer.byteLength(line, 'utf8');
    if (size > maxLineBytes) {
      throw new SchemeSyntaxError(
        `Line ${lines.length + 1} is ${size} bytes long, exceeding the limit of ${maxLineBytes} bytes`,
        'LINE_TOO_LONG',
        { line: lines.length + 1, size, maxLineBytes }
      );
    }

    lines.push(`${line}\n`);
    start = end + 1;
  }

  return lines;
}
