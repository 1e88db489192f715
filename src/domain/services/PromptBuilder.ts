import { Category } from '../model/Category.js';

/** Values interpolated into every instruction template. */
export interface PromptContext {
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
  /** The batch text, one phrase or sentence per line. */
  readonly batch: string;
}

type Template = (ctx: PromptContext) => string;

function outputRules(word: string): string {
  return `Do not forget to escape the commas with double-quotes as the output is a CSV.

Make sure that the ${word} really appears in the line in the third column!`;
}

const CLOSING = `Do not output the CSV header!

Output only valid CSV, no text before or after!`;

const TEMPLATES: Record<Category, Template> = {
  [Category.VERBS]: ({ sourceLanguage, targetLanguage, batch }) => `\
Please extract from the following text lines in ${sourceLanguage} all the verbs.
Write them in a four column CSV:
one column for the ${sourceLanguage} verbs in infinitive present tense,
one column for the translation in ${targetLanguage},
one column with the line content where the word appears in,
and one column with the translation of the line in ${targetLanguage}.

${outputRules('verb')}
Make sure the verb in the first column in ${sourceLanguage} is indeed given in present tense!

${CLOSING}

Here are the text lines:
${batch}`,

  [Category.NOUNS]: ({ sourceLanguage, targetLanguage, batch }) => `\
Please extract from the following text lines in ${sourceLanguage} all the nouns.
Write them in a four column CSV:
one column for the ${sourceLanguage} noun in nominative singular (not plural!),
one column for the translation in ${targetLanguage},
one column with the line content where the word appears in,
and one column with the translation of the line in ${targetLanguage}.

${outputRules('noun')}
Make sure the noun in the first column in ${sourceLanguage} is indeed given in nominative singular!
The noun in the first column in ${sourceLanguage} must NOT be given in nominative plural!

${CLOSING}

Here are the text lines:
${batch}`,

  [Category.ADJECTIVES]: ({ sourceLanguage, targetLanguage, batch }) => `\
Please extract from the following text lines in ${sourceLanguage} all the adjectives in ${sourceLanguage}.
Do not output any adverbs, only adjectives!

Write them in a four column CSV:
one column for the ${sourceLanguage} adjective transformed in nominative singular masculine (not plural! masculine! nominative!),
one column for the translation in ${targetLanguage},
one column with the line content where the word appears in,
and one column with the translation of the line in ${targetLanguage}.

${outputRules('adjective')}
Transform the adjective in the first column in ${sourceLanguage} to nominative singular masculine!
The adjective in the first column must be in masculine!
The adjective in the first column must NOT be in plural!
The adjective in the first column must NOT be in any other case than nominative!

Adjective, not adverb!

${CLOSING}

Here are the text lines:
${batch}`,

  [Category.ADVERBS]: ({ sourceLanguage, targetLanguage, batch }) => `\
Please extract from the following text lines in ${sourceLanguage} all the adverbs in ${sourceLanguage}.
Write them in a four column CSV:
one column for the ${sourceLanguage} adverb,
one column for the translation in ${targetLanguage},
one column with the line content where the word appears in,
and one column with the translation of the line in ${targetLanguage}.

${outputRules('adverb')}

Make sure that the first column is really an adverb and not an adjective!

${CLOSING}

Here are the text lines:
${batch}`,
};

/** Build the instruction prompt for one batch and category. */
export function buildPrompt(category: Category, ctx: PromptContext): string {
  return TEMPLATES[category](ctx);
}
