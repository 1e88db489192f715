import { randomUUID } from 'node:crypto';
import type { Category } from '../domain/model/Category.js';
import type { ExtractionProgress, ExtractionState } from '../domain/model/Extraction.js';
import type { MalformedRecord } from '../domain/model/MalformedRecord.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { GenerationService } from '../domain/ports/GenerationService.js';
import type { RowAggregator } from '../domain/services/RowAggregator.js';
import type { TextBatcher } from '../domain/services/TextBatcher.js';
import type { CsvWriter } from '../infrastructure/writers/CsvWriter.js';
import { ExtractionStatus, canTransition } from '../domain/model/ExtractionStatus.js';
import { EventBus } from './EventBus.js';

/** Collaborators and settings fixed for the lifetime of a run. */
export interface ExtractionSettings {
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
  readonly categories: readonly Category[];
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly generator: GenerationService;
  readonly batcher: TextBatcher;
  readonly aggregator: RowAggregator;
  readonly writer: CsvWriter;
}

/**
 * Mutable state of a single extraction run, shared by the facade and its use cases.
 *
 * Internal: not exported from the public API.
 */
export class ExtractionContext {
  readonly runId = randomUUID();
  readonly eventBus = new EventBus();
  readonly abortController = new AbortController();
  readonly malformed: MalformedRecord[] = [];

  source: DataSource | null = null;
  status: ExtractionStatus = ExtractionStatus.CREATED;
  startedAt?: number;

  totalBatches = 0;
  completedBatches = 0;
  generationCalls = 0;
  acceptedRows = 0;
  duplicateRows = 0;

  constructor(readonly settings: ExtractionSettings) {}

  /** Move to `next`, or throw if the lifecycle does not allow it. */
  transitionTo(next: ExtractionStatus): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid extraction transition from ${this.status} to ${next}`);
    }
    this.status = next;
  }

  progress(): ExtractionProgress {
    return {
      totalBatches: this.totalBatches,
      completedBatches: this.completedBatches,
      generationCalls: this.generationCalls,
      acceptedRows: this.acceptedRows,
      duplicateRows: this.duplicateRows,
      malformedRecords: this.malformed.length,
    };
  }

  snapshot(): ExtractionState {
    return this.startedAt !== undefined
      ? { status: this.status, progress: this.progress(), startedAt: this.startedAt }
      : { status: this.status, progress: this.progress() };
  }
}
