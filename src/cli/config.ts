import { readFile, stat } from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_CATEGORIES, isCategory, type Category } from '../domain/model/Category.js';
import { ExtractionError } from '../domain/errors/ExtractionError.js';
import { DEFAULT_MAX_BATCH_LENGTH } from '../CardExtractor.js';
import { DEFAULT_OPENAI_MODEL } from '../infrastructure/generation/OpenAIGenerationService.js';

/** Key file looked up when `--openai-key-path` is not given. */
export const DEFAULT_KEY_PATH = 'openai-key.txt';

const CategoryListSchema = z
  .string()
  .default(DEFAULT_CATEGORIES.join(','))
  .transform((value, ctx) => {
    const categories: Category[] = [];
    for (const name of value.split(',').map((s) => s.trim())) {
      if (name === '') continue;
      if (!isCategory(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown category "${name}" (expected ${DEFAULT_CATEGORIES.join(', ')})`,
        });
        return z.NEVER;
      }
      if (!categories.includes(name)) categories.push(name);
    }

    if (categories.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one category is required' });
      return z.NEVER;
    }
    return categories;
  });

/** Options of the `extract` command, as received from commander. */
export const ExtractOptionsSchema = z
  .object({
    sourceLanguage: z.string().trim().min(1).default('Russian'),
    targetLanguage: z.string().trim().min(1).default('English'),
    text: z.string().optional(),
    textPath: z.string().min(1).optional(),
    openaiKeyPath: z.string().min(1).optional(),
    model: z.string().min(1).default(DEFAULT_OPENAI_MODEL),
    baseUrl: z.string().url().optional(),
    maxBatchLength: z.coerce.number().int().positive().default(DEFAULT_MAX_BATCH_LENGTH),
    categories: CategoryListSchema,
    maxRetries: z.coerce.number().int().nonnegative().default(0),
    verbose: z.boolean().default(false),
    quiet: z.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    if (options.text !== undefined && options.textPath !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Both --text and --text-path have been specified. You must specify only either one of them.',
      });
    }
    if (options.text === undefined && options.textPath === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Neither --text nor --text-path has been specified.' });
    }
  });

export type ExtractOptions = z.infer<typeof ExtractOptionsSchema>;

function toFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

/** Format zod issues as one line per issue, naming the offending flag. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const key = issue.path[0];
      return typeof key === 'string' ? `${toFlag(key)}: ${issue.message}` : issue.message;
    })
    .join('\n');
}

/**
 * Validate raw command options.
 *
 * @throws ExtractionError with code `CONFIG_INVALID` listing every issue.
 */
export function parseExtractOptions(raw: unknown): ExtractOptions {
  const result = ExtractOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ExtractionError('CONFIG_INVALID', formatIssues(result.error.issues), {
      issues: result.error.issues,
    });
  }
  return result.data;
}

async function isFile(path: string): Promise<boolean | null> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

async function readKeyFile(path: string): Promise<string> {
  const kind = await isFile(path);
  if (kind === null) {
    throw new ExtractionError('CONFIG_INVALID', `--openai-key-path does not exist: ${path}`, { path });
  }
  if (!kind) {
    throw new ExtractionError('CONFIG_INVALID', `--openai-key-path is not a file: ${path}`, { path });
  }

  try {
    return (await readFile(path, 'utf-8')).trim();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError('CONFIG_INVALID', `Failed to read ${path}: ${reason}`, { path });
  }
}

/**
 * Resolve the API key.
 *
 * An explicit key path must name a readable file. Without one, the default key
 * file is used if present, then the `OPENAI_API_KEY` environment variable.
 */
export async function resolveApiKey(keyPath: string | undefined, env: NodeJS.ProcessEnv): Promise<string> {
  if (keyPath !== undefined) {
    return readKeyFile(keyPath);
  }

  if ((await isFile(DEFAULT_KEY_PATH)) !== null) {
    return readKeyFile(DEFAULT_KEY_PATH);
  }

  const fromEnv = env.OPENAI_API_KEY?.trim();
  if (fromEnv) return fromEnv;

  throw new ExtractionError(
    'CONFIG_INVALID',
    `--openai-key-path does not exist: ${DEFAULT_KEY_PATH} (and OPENAI_API_KEY is not set)`,
    { path: DEFAULT_KEY_PATH },
  );
}
