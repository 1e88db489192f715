/**
 * Port for the text-generation collaborator.
 *
 * Called once per batch and category with a complete instruction prompt.
 * Implementations return the raw response text; its shape (four-column CSV
 * without a header) is only a request, never a guarantee.
 *
 * @example
 * ```typescript
 * const stub: GenerationService = {
 *   generate: async () => 'говорить,to speak,Я говорю.,I speak.\n',
 * };
 * ```
 */
export interface GenerationService {
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}
