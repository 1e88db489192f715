/** Number of fields every extracted record must carry. */
export const ROW_FIELD_COUNT = 4;

/** A single flash card as returned by the generation service. */
export interface ExtractionRow {
  /** Term in the source language, in its dictionary form. Used as the deduplication key. */
  readonly source: string;
  /** Translation of the term in the target language. */
  readonly target: string;
  /** The line of the text where the term appears. */
  readonly exampleSource: string;
  /** Translation of that line in the target language. */
  readonly exampleTarget: string;
}

/**
 * Build a row from parsed CSV fields.
 *
 * Returns `null` when the field count is not exactly {@link ROW_FIELD_COUNT}.
 */
export function rowFromFields(fields: readonly string[]): ExtractionRow | null {
  if (fields.length !== ROW_FIELD_COUNT) return null;
  const [source = '', target = '', exampleSource = '', exampleTarget = ''] = fields;
  return { source, target, exampleSource, exampleTarget };
}

/** Flatten a row back to its CSV field order. */
export function rowToFields(row: ExtractionRow): readonly string[] {
  return [row.source, row.target, row.exampleSource, row.exampleTarget];
}

/** Check whether every field of a parsed record is empty. */
export function isEmptyRecord(fields: readonly string[]): boolean {
  return fields.every((f) => f === '');
}
