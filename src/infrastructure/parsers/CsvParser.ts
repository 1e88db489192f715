import Papa from 'papaparse';
import type { SourceParser, ParserOptions } from '../../domain/ports/SourceParser.js';

/** CSV parser adapter using PapaParse. Yields one field list per record, without header mapping. */
export class CsvParser implements SourceParser {
  private readonly delimiter: string;
  private readonly skipEmptyLines: boolean;

  constructor(options?: ParserOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.skipEmptyLines = options?.skipEmptyLines ?? true;
  }

  *parse(data: string): Iterable<readonly string[]> {
    const result = Papa.parse<string[]>(data, {
      header: false,
      delimiter: this.delimiter,
      skipEmptyLines: this.skipEmptyLines,
      dynamicTyping: false,
    });

    yield* result.data;
  }
}
