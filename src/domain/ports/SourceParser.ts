/** Options for delimited-text parsers. */
export interface ParserOptions {
  /** Column delimiter character. Default: `','`. */
  readonly delimiter?: string;
  /** Drop blank lines instead of yielding them as a record with one empty field. Default: `true`. */
  readonly skipEmptyLines?: boolean;
}

/**
 * Port for parsing a generation response into records.
 *
 * Each record is the list of its fields, in column order.
 */
export interface SourceParser {
  parse(data: string): Iterable<readonly string[]>;
}
