import { lineTooLong, splitSucceeded, type SplitResult } from '../model/SplitResult.js';

const LINE_TERMINATORS = new Set([
  '\n',
  '\r',
  '\v',
  '\f',
  '\x1c',
  '\x1d',
  '\x1e',
  '\x85',
  '\u2028',
  '\u2029',
]);

/**
 * Split a text into lines, keeping each line's terminator.
 *
 * `\r\n` counts as a single terminator. The last line may have no terminator.
 * Concatenating the result yields the input.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (!LINE_TERMINATORS.has(ch)) continue;

    const end = ch === '\r' && text.charAt(i + 1) === '\n' ? i + 2 : i + 1;
    lines.push(text.slice(start, end));
    start = end;
    i = end - 1;
  }

  if (start < text.length) {
    lines.push(text.slice(start));
  }

  return lines;
}

/** Length in code points, so that a character outside the BMP counts once. */
export function textLength(text: string): number {
  let length = 0;
  for (const _ of text) length++;
  return length;
}

/**
 * Domain service that packs the lines of a text into length-bounded batches.
 *
 * Pure logic — no I/O, no side effects. Lines are taken in order and never
 * split or reordered: a batch is flushed as soon as the next line would push
 * it over `maxBatchLength`, even if it is shorter than the maximum.
 */
export class TextBatcher {
  constructor(private readonly maxBatchLength: number) {
    if (!Number.isInteger(maxBatchLength) || maxBatchLength < 1) {
      throw new Error('Maximum batch length must be a positive integer');
    }
  }

  /**
   * Split `text` into batches.
   *
   * On success the batches concatenate back to `text` and none is longer than
   * `maxBatchLength`. A line longer than the maximum fails the whole split.
   */
  split(text: string): SplitResult {
    const batches: string[] = [];
    let parts: string[] = [];
    let currentLength = 0;

    for (const [i, line] of splitLines(text).entries()) {
      const length = textLength(line);

      if (length > this.maxBatchLength) {
        return lineTooLong(i + 1, length, this.maxBatchLength);
      }

      if (currentLength + length > this.maxBatchLength) {
        batches.push(parts.join(''));
        parts = [];
        currentLength = 0;
      }

      parts.push(line);
      currentLength += length;
    }

    if (parts.length > 0) {
      batches.push(parts.join(''));
    }

    return splitSucceeded(batches);
  }
}
