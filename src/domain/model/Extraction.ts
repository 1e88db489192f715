import type { ExtractionStatus } from './ExtractionStatus.js';
import type { MalformedRecord } from './MalformedRecord.js';
import type { ResultTable } from './ResultTable.js';

/** Running counters for an extraction. */
export interface ExtractionProgress {
  readonly totalBatches: number;
  readonly completedBatches: number;
  /** Generation calls that returned a response (retries not counted). */
  readonly generationCalls: number;
  readonly acceptedRows: number;
  readonly duplicateRows: number;
  readonly malformedRecords: number;
}

/** Snapshot returned by `CardExtractor.getStatus()`. */
export interface ExtractionState {
  readonly status: ExtractionStatus;
  readonly progress: ExtractionProgress;
  readonly startedAt?: number;
}

/** Final counters once a run has completed. */
export interface ExtractionSummary extends ExtractionProgress {
  readonly elapsedMs: number;
}

/** Everything a completed run produces. */
export interface ExtractionResult {
  readonly table: ResultTable;
  /** Header plus all rows, CSV-encoded. */
  readonly csv: string;
  readonly malformed: readonly MalformedRecord[];
  readonly summary: ExtractionSummary;
}
