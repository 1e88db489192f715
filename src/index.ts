// Main entry point
export { CardExtractor, DEFAULT_MAX_BATCH_LENGTH } from './CardExtractor.js';
export type { CardExtractorConfig } from './CardExtractor.js';

// Domain model
export { Category, DEFAULT_CATEGORIES, isCategory } from './domain/model/Category.js';
export { ROW_FIELD_COUNT, rowFromFields, rowToFields, isEmptyRecord } from './domain/model/ExtractionRow.js';
export type { ExtractionRow } from './domain/model/ExtractionRow.js';
export { ResultTable } from './domain/model/ResultTable.js';
export type { MalformedRecord } from './domain/model/MalformedRecord.js';
export type { SplitResult, LineTooLongError } from './domain/model/SplitResult.js';
export { ExtractionStatus } from './domain/model/ExtractionStatus.js';
export type {
  ExtractionProgress,
  ExtractionState,
  ExtractionSummary,
  ExtractionResult,
} from './domain/model/Extraction.js';

// Errors
export { ExtractionError, GenerationError, isRetryable } from './domain/errors/ExtractionError.js';
export type { ExtractionErrorCode } from './domain/errors/ExtractionError.js';

// Domain services
export { TextBatcher, splitLines, textLength } from './domain/services/TextBatcher.js';
export { RowAggregator, stripCodeFences } from './domain/services/RowAggregator.js';
export type { AggregationOrigin, AggregationStep } from './domain/services/RowAggregator.js';
export { buildPrompt } from './domain/services/PromptBuilder.js';
export type { PromptContext } from './domain/services/PromptBuilder.js';
export { validateCardCsv } from './domain/services/CardCsvValidator.js';
export type { CardCsvReport, InvalidCardRow } from './domain/services/CardCsvValidator.js';

// Ports
export type { GenerationService } from './domain/ports/GenerationService.js';
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { SourceParser, ParserOptions } from './domain/ports/SourceParser.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ExtractionStartedEvent,
  BatchStartedEvent,
  GenerationCompletedEvent,
  GenerationRetriedEvent,
  RecordMalformedEvent,
  BatchCompletedEvent,
  ExtractionCompletedEvent,
  ExtractionAbortedEvent,
  ExtractionFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { CsvWriter, formatHeader } from './infrastructure/writers/CsvWriter.js';
export type { CsvWriterOptions, CsvLanguages } from './infrastructure/writers/CsvWriter.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { readAll } from './infrastructure/sources/readAll.js';
export {
  OpenAIGenerationService,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENAI_BASE_URL,
} from './infrastructure/generation/OpenAIGenerationService.js';
export type { OpenAIGenerationConfig } from './infrastructure/generation/OpenAIGenerationService.js';
