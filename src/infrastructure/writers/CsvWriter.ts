import Papa from 'papaparse';
import { rowToFields, type ExtractionRow } from '../../domain/model/ExtractionRow.js';

/** Language names used for the header record. */
export interface CsvLanguages {
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
}

export interface CsvWriterOptions {
  /** Column delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Record terminator. Default: `'\r\n'`. */
  readonly newline?: string;
}

/** Header record of a card CSV. */
export function formatHeader(languages: CsvLanguages): string[] {
  return [
    languages.sourceLanguage,
    languages.targetLanguage,
    `Phrase in ${languages.sourceLanguage}`,
    `Phrase in ${languages.targetLanguage}`,
  ];
}

/**
 * Serializes extracted rows as CSV with PapaParse.
 *
 * Fields containing the delimiter, a double quote or a line break are quoted,
 * with inner quotes doubled. Every record, the last one included, ends with
 * the newline sequence.
 */
export class CsvWriter {
  private readonly delimiter: string;
  private readonly newline: string;

  constructor(options?: CsvWriterOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.newline = options?.newline ?? '\r\n';
  }

  write(rows: readonly ExtractionRow[], languages: CsvLanguages): string {
    const records = [formatHeader(languages), ...rows.map((row) => [...rowToFields(row)])];

    const csv = Papa.unparse(records, {
      delimiter: this.delimiter,
      newline: this.newline,
      quotes: false,
    });

    return csv + this.newline;
  }
}
