/**
 * Grammatical categories extracted from every batch.
 *
 * Each category has its own instruction template (see `PromptBuilder`).
 */
export const Category = {
  VERBS: 'verbs',
  NOUNS: 'nouns',
  ADJECTIVES: 'adjectives',
  ADVERBS: 'adverbs',
} as const;

export type Category = (typeof Category)[keyof typeof Category];

/** Categories in the order they are processed within a batch. */
export const DEFAULT_CATEGORIES: readonly Category[] = [
  Category.VERBS,
  Category.NOUNS,
  Category.ADJECTIVES,
  Category.ADVERBS,
];

/** Type guard for category names coming from user input. */
export function isCategory(value: string): value is Category {
  return DEFAULT_CATEGORIES.some((c) => c === value);
}
