import type { ExtractionRow } from './ExtractionRow.js';

/**
 * Ordered, append-only collection of extracted rows, unique by `source`.
 *
 * The first row seen for a key wins; later rows with the same key are
 * rejected for the lifetime of the table. Keys are compared exactly as given
 * (no case folding or trimming).
 */
export class ResultTable {
  private readonly entries: ExtractionRow[] = [];
  private readonly seenKeys = new Set<string>();

  /** Append the row unless its key was seen before. Returns `true` when appended. */
  add(row: ExtractionRow): boolean {
    if (this.seenKeys.has(row.source)) return false;

    this.seenKeys.add(row.source);
    this.entries.push(row);
    return true;
  }

  has(key: string): boolean {
    return this.seenKeys.has(key);
  }

  get rows(): readonly ExtractionRow[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
