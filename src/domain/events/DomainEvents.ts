import type { Category } from '../model/Category.js';
import type { ExtractionProgress, ExtractionSummary } from '../model/Extraction.js';
import type { MalformedRecord } from '../model/MalformedRecord.js';

/** Emitted once the input has been split, before the first generation call. */
export interface ExtractionStartedEvent {
  readonly type: 'extraction:started';
  readonly runId: string;
  readonly totalBatches: number;
  readonly categories: readonly Category[];
  readonly timestamp: number;
}

/** Emitted when a batch begins processing. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly runId: string;
  readonly batchIndex: number;
  /** Length of the batch text in code points. */
  readonly length: number;
  readonly timestamp: number;
}

/** Emitted after a response for one batch and category has been aggregated. */
export interface GenerationCompletedEvent {
  readonly type: 'generation:completed';
  readonly runId: string;
  readonly batchIndex: number;
  readonly category: Category;
  readonly acceptedCount: number;
  readonly duplicateCount: number;
  readonly malformedCount: number;
  readonly timestamp: number;
}

/** Emitted when a failed generation call is about to be attempted again. */
export interface GenerationRetriedEvent {
  readonly type: 'generation:retried';
  readonly runId: string;
  readonly batchIndex: number;
  readonly category: Category;
  /** The attempt that failed (1-based). */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for each record skipped for having the wrong number of fields. */
export interface RecordMalformedEvent {
  readonly type: 'record:malformed';
  readonly runId: string;
  readonly record: MalformedRecord;
  readonly timestamp: number;
}

/** Emitted after every category of a batch has been processed. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly runId: string;
  readonly batchIndex: number;
  /** Rows added to the table by this batch. */
  readonly acceptedCount: number;
  readonly timestamp: number;
}

/** Emitted when every batch has been processed. */
export interface ExtractionCompletedEvent {
  readonly type: 'extraction:completed';
  readonly runId: string;
  readonly summary: ExtractionSummary;
  readonly timestamp: number;
}

/** Emitted when `abort()` stops a running extraction. */
export interface ExtractionAbortedEvent {
  readonly type: 'extraction:aborted';
  readonly runId: string;
  readonly progress: ExtractionProgress;
  readonly timestamp: number;
}

/** Emitted when the run stops on an unrecoverable error. */
export interface ExtractionFailedEvent {
  readonly type: 'extraction:failed';
  readonly runId: string;
  readonly code: string;
  readonly error: string;
  readonly timestamp: number;
}

export type DomainEvent =
  | ExtractionStartedEvent
  | BatchStartedEvent
  | GenerationCompletedEvent
  | GenerationRetriedEvent
  | RecordMalformedEvent
  | BatchCompletedEvent
  | ExtractionCompletedEvent
  | ExtractionAbortedEvent
  | ExtractionFailedEvent;

export type EventType = DomainEvent['type'];

/** Narrow the event union to the payload of a given event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

/** Type guard matching an event against an event type. */
export function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
