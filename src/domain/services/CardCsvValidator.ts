import type { SourceParser } from '../ports/SourceParser.js';
import { rowFromFields, type ExtractionRow } from '../model/ExtractionRow.js';

/** A record of a card CSV that cannot be turned into a card. */
export interface InvalidCardRow {
  /** One-based record number, the header being record 1. */
  readonly rowNumber: number;
  readonly fields: readonly string[];
}

/** Result of checking a generated card CSV. */
export interface CardCsvReport {
  /** Fields of the header record, or `null` for an empty file. */
  readonly header: readonly string[] | null;
  readonly rows: readonly ExtractionRow[];
  readonly invalidRows: readonly InvalidCardRow[];
}

/**
 * Check a card CSV (header first, then one card per record) and separate the
 * usable cards from records without exactly four fields.
 *
 * With a parser that keeps blank lines, each blank line is an invalid row
 * without fields and counts towards the row numbers.
 */
export function validateCardCsv(csv: string, parser: SourceParser): CardCsvReport {
  let header: readonly string[] | null = null;
  const rows: ExtractionRow[] = [];
  const invalidRows: InvalidCardRow[] = [];

  const records = [...parser.parse(csv)].map((fields) => (isBlankLine(fields) ? [] : fields));
  // The line break ending the last record opens no new one.
  if (/[\r\n]$/.test(csv) && records.at(-1)?.length === 0) {
    records.pop();
  }

  let rowNumber = 0;
  for (const fields of records) {
    rowNumber++;
    if (header === null) {
      header = fields;
      continue;
    }

    const row = rowFromFields(fields);
    if (row === null) {
      invalidRows.push({ rowNumber, fields });
    } else {
      rows.push(row);
    }
  }

  return { header, rows, invalidRows };
}

function isBlankLine(fields: readonly string[]): boolean {
  return fields.length === 1 && fields[0] === '';
}
