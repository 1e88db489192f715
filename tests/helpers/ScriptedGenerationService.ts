import type { GenerationService } from '../../src/domain/ports/GenerationService.js';
import { isCategory, type Category } from '../../src/domain/model/Category.js';

/** What the scripted service saw for one call. */
export interface GenerationCall {
  readonly category: Category;
  readonly batch: string;
  readonly prompt: string;
}

/** Returns the response for a call, or throws to make the call fail. */
export type Responder = (call: GenerationCall, attempt: number) => string | Promise<string>;

const CATEGORY_PATTERN = /all the (\w+)/;
const BATCH_MARKER = 'Here are the text lines:\n';

function describeCall(prompt: string): GenerationCall {
  const category = CATEGORY_PATTERN.exec(prompt)?.[1];
  const markerAt = prompt.indexOf(BATCH_MARKER);
  if (category === undefined || !isCategory(category) || markerAt < 0) {
    throw new Error(`Unexpected prompt: ${prompt.slice(0, 80)}`);
  }
  return { category, batch: prompt.slice(markerAt + BATCH_MARKER.length), prompt };
}

/**
 * In-process generation service that answers from a script.
 *
 * Every call is recorded, failed ones included. The abort signal is ignored,
 * so cancellation has to be enforced by the caller.
 */
export class ScriptedGenerationService implements GenerationService {
  readonly calls: GenerationCall[] = [];

  constructor(private readonly responder: Responder) {}

  async generate(prompt: string): Promise<string> {
    const call = describeCall(prompt);
    const attempt = this.calls.filter((c) => c.prompt === prompt).length + 1;
    this.calls.push(call);
    return this.responder(call, attempt);
  }
}

/** Responder keyed by category; categories without an entry yield an empty response. */
export function byCategory(responses: Partial<Record<Category, string>>): Responder {
  return (call) => responses[call.category] ?? '';
}
