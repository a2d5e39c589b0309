import { readFileSync } from 'node:fs';
import { z } from 'zod';

const wordList = z.array(z.string().trim().min(1)).min(1);

const vocabularySchema = z.object({
  forbiddenNameWords: wordList,
  nameConnectors: wordList,
  honorificTitles: wordList,
  trailingNoiseTokens: wordList,
  leadingPronouns: wordList,
  formalAddressPhrases: wordList,
  rgContextKeywords: wordList,
  addressKeywords: wordList,
});

export type VocabularySource = z.input<typeof vocabularySchema>;

/**
 * Read-only word lists shared by the extractors, validators and the name
 * extractor. Set entries are lower-cased.
 */
export interface Vocabulary {
  readonly forbiddenNameWords: ReadonlySet<string>;
  readonly nameConnectors: ReadonlySet<string>;
  readonly honorificTitles: ReadonlySet<string>;
  readonly trailingNoiseTokens: ReadonlySet<string>;
  readonly leadingPronouns: ReadonlySet<string>;
  readonly formalAddressPhrases: readonly string[];
  readonly rgContextKeywords: readonly string[];
  readonly addressKeywords: readonly string[];
}

export const DEFAULT_VOCABULARY_PATH = new URL('../../../data/vocabulary.json', import.meta.url);

function toSet(words: string[]): ReadonlySet<string> {
  return new Set(words.map((word) => word.toLowerCase()));
}

function toList(words: string[]): readonly string[] {
  return Object.freeze(words.map((word) => word.toLowerCase()));
}

export function createVocabulary(source: unknown): Vocabulary {
  const result = vocabularySchema.safeParse(source);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid vocabulary: ${details}`);
  }

  const data = result.data;
  return Object.freeze({
    forbiddenNameWords: toSet(data.forbiddenNameWords),
    nameConnectors: toSet(data.nameConnectors),
    honorificTitles: toSet(data.honorificTitles),
    trailingNoiseTokens: toSet(data.trailingNoiseTokens),
    leadingPronouns: toSet(data.leadingPronouns),
    formalAddressPhrases: toList(data.formalAddressPhrases),
    rgContextKeywords: toList(data.rgContextKeywords),
    addressKeywords: toList(data.addressKeywords),
  });
}

export function loadVocabulary(path: URL | string = DEFAULT_VOCABULARY_PATH): Vocabulary {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return createVocabulary(raw);
}

let defaultVocabulary: Vocabulary | null = null;

/** Loads the bundled vocabulary once per process. */
export function getDefaultVocabulary(): Vocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = loadVocabulary();
  }
  return defaultVocabulary;
}
