import { z } from 'zod';
import type { GenerationService } from '../../domain/ports/GenerationService.js';
import { GenerationError } from '../../domain/errors/ExtractionError.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4-turbo-preview';
export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

export interface OpenAIGenerationConfig {
  /** API key, passed as an opaque bearer token. */
  readonly apiKey: string;
  /** Chat model. Default: `gpt-4-turbo-preview`. */
  readonly model?: string;
  /** API root. Default: `https://api.openai.com/v1`. */
  readonly baseUrl?: string;
  /** Request timeout in milliseconds. Default: `60000`. */
  readonly timeout?: number;
  /** Sampling temperature. Omitted from the request when unset. */
  readonly temperature?: number;
}

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).optional() })).optional(),
});

/**
 * Generation service backed by the OpenAI chat completions endpoint.
 *
 * Each prompt is sent as a single user message. Uses the global `fetch`.
 */
export class OpenAIGenerationService implements GenerationService {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly temperature: number | undefined;

  constructor(config: OpenAIGenerationConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_OPENAI_MODEL;
    this.baseUrl = (config.baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, '');
    this.timeout = config.timeout ?? 60000;
    this.temperature = config.temperature;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);
    const onAbort = (): void => {
      controller.abort();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.toError(response);
      }

      const parsed = ChatCompletionSchema.safeParse(await response.json());
      const content = parsed.success ? parsed.data.choices?.[0]?.message?.content : undefined;
      if (typeof content !== 'string') {
        throw new GenerationError('INVALID_RESPONSE', 'Invalid response structure from OpenAI API', true);
      }

      return content;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async toError(response: Response): Promise<GenerationError> {
    const errorText = await response.text();
    const sanitized = errorText.length > 200 ? errorText.substring(0, 200) + '...' : errorText;
    const details = { status: response.status, model: this.model };

    if (response.status === 401 || response.status === 403) {
      return new GenerationError(
        'AUTHENTICATION_FAILED',
        `Failed to authenticate with OpenAI: ${String(response.status)} - ${sanitized}`,
        false,
        details,
      );
    }

    return new GenerationError(
      'GENERATION_FAILED',
      `OpenAI API error: ${String(response.status)} - ${sanitized}`,
      true,
      details,
    );
  }
}
