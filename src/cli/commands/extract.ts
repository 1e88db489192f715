import { Command } from 'commander';
import type { GenerationService } from '../../domain/ports/GenerationService.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import { CardExtractor } from '../../CardExtractor.js';
import { BufferSource } from '../../infrastructure/sources/BufferSource.js';
import { FilePathSource } from '../../infrastructure/sources/FilePathSource.js';
import {
  OpenAIGenerationService,
  type OpenAIGenerationConfig,
} from '../../infrastructure/generation/OpenAIGenerationService.js';
import { Logger, type LogSink } from '../../utils/logger.js';
import { parseExtractOptions, resolveApiKey, DEFAULT_KEY_PATH, type ExtractOptions } from '../config.js';

/** Seams replaced in tests. */
export interface ExtractDependencies {
  /** Where the CSV is written. Default: `process.stdout`. */
  readonly stdout?: LogSink;
  /** Default: a new stderr logger for every run. */
  readonly logger?: Logger;
  readonly env?: NodeJS.ProcessEnv;
  readonly createGenerator?: (config: OpenAIGenerationConfig) => GenerationService;
}

async function openSource(options: ExtractOptions): Promise<DataSource> {
  if (options.textPath !== undefined) {
    const source = new FilePathSource(options.textPath);
    await source.ensureReadable();
    return source;
  }
  return new BufferSource(options.text ?? '', { fileName: '--text' });
}

function logProgress(extractor: CardExtractor, log: Logger): void {
  let totalBatches = 0;

  extractor
    .on('extraction:started', (e) => {
      totalBatches = e.totalBatches;
      log.debug(`Split the text into ${String(e.totalBatches)} batches (categories: ${e.categories.join(', ')})`);
    })
    .on('batch:started', (e) => {
      log.debug(`Batch ${String(e.batchIndex + 1)}/${String(totalBatches)} (${String(e.length)} characters)`);
    })
    .on('generation:completed', (e) => {
      log.debug(
        `  ${e.category}: ${String(e.acceptedCount)} new, ${String(e.duplicateCount)} duplicates, ${String(e.malformedCount)} malformed`,
      );
    })
    .on('generation:retried', (e) => {
      log.warn(
        `Generation of ${e.category} for batch ${String(e.batchIndex + 1)} failed (attempt ${String(e.attempt)} of ${String(e.maxRetries + 1)}): ${e.error}`,
      );
    })
    .on('record:malformed', (e) => {
      const where = e.record.batchIndex !== undefined ? ` in batch ${String(e.record.batchIndex + 1)}` : '';
      const category = e.record.category !== undefined ? ` (${e.record.category})` : '';
      log.warn(
        `Ignoring a record with ${String(e.record.fields.length)} fields instead of ${String(e.record.expectedFieldCount)}${where}${category}: ${JSON.stringify(e.record.fields)}`,
      );
    });
}

/**
 * Run the extract command. Returns the process exit code.
 */
export async function runExtract(rawOptions: unknown, deps: ExtractDependencies = {}): Promise<number> {
  const log = deps.logger ?? new Logger();
  const stdout = deps.stdout ?? process.stdout;

  try {
    const options = parseExtractOptions(rawOptions);
    if (options.quiet) log.setLevel('silent');
    else if (options.verbose) log.setLevel('debug');

    const source = await openSource(options);
    const apiKey = await resolveApiKey(options.openaiKeyPath, deps.env ?? process.env);
    const createGenerator = deps.createGenerator ?? ((config) => new OpenAIGenerationService(config));

    const extractor = new CardExtractor({
      sourceLanguage: options.sourceLanguage,
      targetLanguage: options.targetLanguage,
      generator: createGenerator({ apiKey, model: options.model, baseUrl: options.baseUrl }),
      maxBatchLength: options.maxBatchLength,
      categories: options.categories,
      maxRetries: options.maxRetries,
    }).from(source);
    logProgress(extractor, log);

    const { csv, summary } = await extractor.extract();
    stdout.write(csv);

    log.success(
      `Extracted ${String(summary.acceptedRows)} cards from ${String(summary.totalBatches)} batches ` +
        `(${String(summary.duplicateRows)} duplicates dropped, ${String(summary.malformedRecords)} malformed records skipped)`,
    );
    return 0;
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

/**
 * Create the extract command.
 */
export function createExtractCommand(deps: ExtractDependencies = {}): Command {
  return new Command('extract')
    .description('Extract flash cards from a text as CSV on stdout')
    .option('--source-language <name>', 'source language of the text', 'Russian')
    .option('--target-language <name>', 'target language which we already master', 'English')
    .option('--text <text>', 'text that we want to extract the flash cards from')
    .option('--text-path <path>', 'path to the text file to extract the flash cards from (instead of --text)')
    .option('--openai-key-path <path>', `path to the file containing the OpenAI key (default: ${DEFAULT_KEY_PATH}, then OPENAI_API_KEY)`)
    .option('--model <model>', 'generation model')
    .option('--base-url <url>', 'OpenAI-compatible API root')
    .option('--max-batch-length <n>', 'maximum length of a text batch per prompt')
    .option('--categories <list>', 'comma-separated categories (verbs, nouns, adjectives, adverbs)')
    .option('--max-retries <n>', 'retries per failed generation call')
    .option('--verbose', 'log progress of every batch')
    .option('--quiet', 'log nothing')
    .action(async (options: Record<string, unknown>) => {
      const code = await runExtract(options, deps);
      if (code !== 0) process.exit(code);
    });
}
