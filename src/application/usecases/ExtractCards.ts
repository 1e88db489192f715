import type { Category } from '../../domain/model/Category.js';
import type { ExtractionResult } from '../../domain/model/Extraction.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { ExtractionContext } from '../ExtractionContext.js';
import { ExtractionStatus } from '../../domain/model/ExtractionStatus.js';
import { ExtractionError, isRetryable } from '../../domain/errors/ExtractionError.js';
import { buildPrompt } from '../../domain/services/PromptBuilder.js';
import { textLength } from '../../domain/services/TextBatcher.js';
import { readAll } from '../../infrastructure/sources/readAll.js';

/**
 * Runs one extraction: read → split → (generate → aggregate) per batch and
 * category → serialize.
 *
 * Generation calls are strictly sequential so that the first row seen for a
 * key is the one from the earliest batch and category.
 */
export class ExtractCards {
  constructor(private readonly ctx: ExtractionContext) {}

  async execute(): Promise<ExtractionResult> {
    const source = this.ctx.source;
    if (!source) {
      throw new Error('No source configured. Call from() before extract().');
    }

    this.ctx.transitionTo(ExtractionStatus.PROCESSING);
    this.ctx.startedAt = Date.now();

    try {
      return await this.run(source);
    } catch (error) {
      throw this.fail(error);
    }
  }

  private async run(source: DataSource): Promise<ExtractionResult> {
    const { settings, eventBus, runId } = this.ctx;
    const text = await readAll(source);
    this.throwIfAborted();

    const split = settings.batcher.split(text);
    if (!split.ok) {
      const { code: _code, message, ...details } = split.error;
      throw new ExtractionError(
        'LINE_TOO_LONG',
        `Could not split ${describeSource(source)} into batches for generation prompts: ${message}`,
        details,
      );
    }

    this.ctx.totalBatches = split.batches.length;
    eventBus.emit({
      type: 'extraction:started',
      runId,
      totalBatches: split.batches.length,
      categories: settings.categories,
      timestamp: Date.now(),
    });

    for (const [batchIndex, batch] of split.batches.entries()) {
      eventBus.emit({ type: 'batch:started', runId, batchIndex, length: textLength(batch), timestamp: Date.now() });

      let batchAccepted = 0;
      for (const category of settings.categories) {
        batchAccepted += await this.processCategory(batch, batchIndex, category);
      }

      this.ctx.completedBatches++;
      eventBus.emit({ type: 'batch:completed', runId, batchIndex, acceptedCount: batchAccepted, timestamp: Date.now() });
    }

    const table = settings.aggregator.table;
    const csv = settings.writer.write(table.rows, settings);
    const summary = { ...this.ctx.progress(), elapsedMs: Date.now() - (this.ctx.startedAt ?? Date.now()) };

    this.ctx.transitionTo(ExtractionStatus.COMPLETED);
    eventBus.emit({ type: 'extraction:completed', runId, summary, timestamp: Date.now() });

    return { table, csv, malformed: [...this.ctx.malformed], summary };
  }

  /** Generate and aggregate one category of one batch. Returns the number of rows added. */
  private async processCategory(batch: string, batchIndex: number, category: Category): Promise<number> {
    const { settings, eventBus, runId } = this.ctx;
    this.throwIfAborted();

    const prompt = buildPrompt(category, {
      sourceLanguage: settings.sourceLanguage,
      targetLanguage: settings.targetLanguage,
      batch,
    });
    const response = await this.generateWithRetry(prompt, batchIndex, category);
    this.ctx.generationCalls++;

    const step = settings.aggregator.aggregate(response, { batchIndex, category });
    this.ctx.acceptedRows += step.accepted.length;
    this.ctx.duplicateRows += step.duplicates.length;

    for (const record of step.malformed) {
      this.ctx.malformed.push(record);
      eventBus.emit({ type: 'record:malformed', runId, record, timestamp: Date.now() });
    }

    eventBus.emit({
      type: 'generation:completed',
      runId,
      batchIndex,
      category,
      acceptedCount: step.accepted.length,
      duplicateCount: step.duplicates.length,
      malformedCount: step.malformed.length,
      timestamp: Date.now(),
    });

    return step.accepted.length;
  }

  private async generateWithRetry(prompt: string, batchIndex: number, category: Category): Promise<string> {
    const { settings, eventBus, runId, abortController } = this.ctx;
    const maxAttempts = 1 + settings.maxRetries;

    for (let attempt = 1; ; attempt++) {
      try {
        return await settings.generator.generate(prompt, abortController.signal);
      } catch (error) {
        if (attempt >= maxAttempts || abortController.signal.aborted || !isRetryable(error)) {
          throw error;
        }

        eventBus.emit({
          type: 'generation:retried',
          runId,
          batchIndex,
          category,
          attempt,
          maxRetries: settings.maxRetries,
          error: error instanceof Error ? error.message : String(error),
          timestamp: Date.now(),
        });

        await this.sleep(settings.retryDelayMs * Math.pow(2, attempt - 1));
        this.throwIfAborted();
      }
    }
  }

  private throwIfAborted(): void {
    if (this.ctx.abortController.signal.aborted) {
      throw new ExtractionError('ABORTED', 'Extraction aborted');
    }
  }

  /** Record the terminal status for `error` and return the error to rethrow. */
  private fail(error: unknown): unknown {
    const { eventBus, runId } = this.ctx;

    if (this.ctx.abortController.signal.aborted) {
      this.ctx.transitionTo(ExtractionStatus.ABORTED);
      eventBus.emit({ type: 'extraction:aborted', runId, progress: this.ctx.progress(), timestamp: Date.now() });
      return error instanceof ExtractionError && error.code === 'ABORTED'
        ? error
        : new ExtractionError('ABORTED', 'Extraction aborted');
    }

    this.ctx.transitionTo(ExtractionStatus.FAILED);
    eventBus.emit({
      type: 'extraction:failed',
      runId,
      code: error instanceof ExtractionError ? error.code : 'UNKNOWN',
      error: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
    });
    return error;
  }

  private sleep(ms: number): Promise<void> {
    const signal = this.ctx.abortController.signal;
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const timeoutId = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
      function done(): void {
        clearTimeout(timeoutId);
        signal.removeEventListener('abort', done);
        resolve();
      }
    });
  }
}

function describeSource(source: DataSource): string {
  return source.metadata().fileName ?? 'the text';
}
