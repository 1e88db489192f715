import type { Category } from '../model/Category.js';
import type { MalformedRecord } from '../model/MalformedRecord.js';
import type { SourceParser } from '../ports/SourceParser.js';
import { ROW_FIELD_COUNT, isEmptyRecord, rowFromFields, type ExtractionRow } from '../model/ExtractionRow.js';
import { ResultTable } from '../model/ResultTable.js';

/** Where a response came from. Copied onto malformed-record reports. */
export interface AggregationOrigin {
  readonly batchIndex?: number;
  readonly category?: Category;
}

/** What happened to the records of a single response. */
export interface AggregationStep {
  /** Rows appended to the table, in order. */
  readonly accepted: readonly ExtractionRow[];
  /** Well-formed rows whose key was already in the table. */
  readonly duplicates: readonly ExtractionRow[];
  /** Records skipped for having the wrong number of fields. */
  readonly malformed: readonly MalformedRecord[];
}

const FENCED_BLOCK = /^\s*```[\w-]*[ \t]*\r?\n([\s\S]*?)```\s*$/;

/** Unwrap a response that arrived inside a Markdown code block. */
export function stripCodeFences(response: string): string {
  const match = FENCED_BLOCK.exec(response);
  return match?.[1] ?? response;
}

/**
 * Folds generation responses into a single {@link ResultTable}.
 *
 * Responses must be fed in processing order (batches in text order, categories
 * in their fixed order within a batch) since the first row seen for a key wins.
 * Malformed records are reported and skipped; they never fail the run.
 */
export class RowAggregator {
  private readonly resultTable: ResultTable;

  constructor(
    private readonly parser: SourceParser,
    table?: ResultTable,
  ) {
    this.resultTable = table ?? new ResultTable();
  }

  get table(): ResultTable {
    return this.resultTable;
  }

  aggregate(response: string, origin: AggregationOrigin = {}): AggregationStep {
    const accepted: ExtractionRow[] = [];
    const duplicates: ExtractionRow[] = [];
    const malformed: MalformedRecord[] = [];

    let recordIndex = 0;
    for (const fields of this.parser.parse(stripCodeFences(response))) {
      const index = recordIndex++;
      if (isEmptyRecord(fields)) continue;

      const row = rowFromFields(fields);
      if (row === null) {
        malformed.push({ recordIndex: index, fields, expectedFieldCount: ROW_FIELD_COUNT, ...origin });
        continue;
      }

      if (this.resultTable.add(row)) {
        accepted.push(row);
      } else {
        duplicates.push(row);
      }
    }

    return { accepted, duplicates, malformed };
  }

  /** Aggregate every response in order and return the table. */
  aggregateAll(responses: Iterable<string>): ResultTable {
    for (const response of responses) {
      this.aggregate(response);
    }
    return this.resultTable;
  }
}
