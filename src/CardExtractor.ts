import type { Category } from './domain/model/Category.js';
import type { ExtractionResult, ExtractionState } from './domain/model/Extraction.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { GenerationService } from './domain/ports/GenerationService.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import { DEFAULT_CATEGORIES } from './domain/model/Category.js';
import { ExtractionStatus } from './domain/model/ExtractionStatus.js';
import { RowAggregator } from './domain/services/RowAggregator.js';
import { TextBatcher } from './domain/services/TextBatcher.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { CsvWriter } from './infrastructure/writers/CsvWriter.js';
import { ExtractionContext } from './application/ExtractionContext.js';
import { ExtractCards } from './application/usecases/ExtractCards.js';

/** Maximum batch length used when none is configured. */
export const DEFAULT_MAX_BATCH_LENGTH = 500;

/** Configuration for an extraction run. */
export interface CardExtractorConfig {
  /** Language of the text, e.g. `'Russian'`. */
  readonly sourceLanguage: string;
  /** Language the cards are translated to, e.g. `'English'`. */
  readonly targetLanguage: string;
  /** Generation collaborator called once per batch and category. */
  readonly generator: GenerationService;
  /** Maximum length of a batch, in characters. Default: `500`. */
  readonly maxBatchLength?: number;
  /** Categories to extract, in processing order. Default: verbs, nouns, adjectives, adverbs. */
  readonly categories?: readonly Category[];
  /**
   * Maximum number of retry attempts for a failed generation call.
   * Authentication failures are never retried.
   * Default: `0` (no retries).
   */
  readonly maxRetries?: number;
  /**
   * Base delay in milliseconds between retry attempts.
   * Uses exponential backoff: `retryDelayMs * 2^(attempt - 1)`.
   * Default: `1000`.
   */
  readonly retryDelayMs?: number;
  /** Parser for generation responses. Default: `CsvParser` with `,` as delimiter. */
  readonly parser?: SourceParser;
  /** Serializer for the final table. Default: `CsvWriter`. */
  readonly writer?: CsvWriter;
}

/**
 * Facade that orchestrates a full extraction: read → split → generate → aggregate → serialize.
 *
 * One instance runs once; create a new one for every text.
 *
 * @example
 * ```typescript
 * const extractor = new CardExtractor({ sourceLanguage: 'Russian', targetLanguage: 'English', generator });
 * extractor.from(new FilePathSource('story.txt'));
 * const { csv } = await extractor.extract();
 * ```
 */
export class CardExtractor {
  private readonly ctx: ExtractionContext;

  constructor(config: CardExtractorConfig) {
    const categories = config.categories ?? DEFAULT_CATEGORIES;
    if (categories.length === 0) {
      throw new Error('At least one category is required');
    }

    const maxRetries = config.maxRetries ?? 0;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new Error('maxRetries must be a non-negative integer');
    }

    this.ctx = new ExtractionContext({
      sourceLanguage: config.sourceLanguage,
      targetLanguage: config.targetLanguage,
      categories,
      maxRetries,
      retryDelayMs: config.retryDelayMs ?? 1000,
      generator: config.generator,
      batcher: new TextBatcher(config.maxBatchLength ?? DEFAULT_MAX_BATCH_LENGTH),
      aggregator: new RowAggregator(config.parser ?? new CsvParser()),
      writer: config.writer ?? new CsvWriter(),
    });
  }

  /** Set the text to extract from. */
  from(source: DataSource): this {
    this.ctx.source = source;
    return this;
  }

  /**
   * Run the extraction.
   *
   * @throws ExtractionError with code `LINE_TOO_LONG` before any generation call
   *   when a line does not fit in a batch, `ABORTED` after `abort()`, or the
   *   generation service's error once retries are exhausted.
   */
  async extract(): Promise<ExtractionResult> {
    return new ExtractCards(this.ctx).execute();
  }

  /** Stop the run at the next opportunity. Has no effect once the run has ended. */
  abort(): void {
    if (this.ctx.status === ExtractionStatus.CREATED || this.ctx.status === ExtractionStatus.PROCESSING) {
      this.ctx.abortController.abort();
    }
  }

  getStatus(): ExtractionState {
    return this.ctx.snapshot();
  }

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }
}
