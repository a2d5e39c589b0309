import { z } from 'zod';
import { isModelLoaded, loadModel, type ModelOptions, type ModelSession } from './model-loader.js';
import type { EntityRecognizer, EntitySpan } from '../shared/types/entity.types.js';

const rawTokenSchema = z.object({
  entity: z.string(),
  word: z.string(),
  score: z.number(),
  index: z.number(),
});

const rawTokensSchema = z.array(rawTokenSchema);

export type RawToken = z.infer<typeof rawTokenSchema>;

interface TokenGroup {
  label: string;
  pieces: string[];
  scores: number[];
  lastIdx: number;
}

function parseLabel(entity: string): string | null {
  if (!entity || entity === 'O') return null;
  // Strip B-/I- prefix
  if (entity.startsWith('B-') || entity.startsWith('I-')) {
    return entity.slice(2);
  }
  return entity;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds the word pieces in the source text, allowing whitespace between
 * them, and skipping ranges already claimed by earlier spans.
 */
function locate(
  pieces: string[],
  text: string,
  usedRanges: Array<[number, number]>
): [number, number] | null {
  const pattern = new RegExp(pieces.map(escapeRegExp).join('\\s*'), 'g');

  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (!usedRanges.some(([s, e]) => start < e && end > s)) {
      return [start, end];
    }
  }

  return null;
}

function finalizeGroup(
  group: TokenGroup,
  text: string,
  usedRanges: Array<[number, number]>
): EntitySpan | null {
  if (group.pieces.join('').length < 2) return null;

  const pos = locate(group.pieces, text, usedRanges);
  if (!pos) return null;

  usedRanges.push(pos);
  return {
    text: text.slice(pos[0], pos[1]),
    label: group.label,
    start: pos[0],
    end: pos[1],
    score: group.scores.reduce((a, b) => a + b, 0) / group.scores.length,
  };
}

/**
 * Merges B-/I- tagged word pieces into entity spans located in the source text.
 * A gap in token indices, a label change or a B- tag on a whole word starts a new span.
 */
export function groupEntitySpans(tokens: RawToken[], text: string): EntitySpan[] {
  const spans: EntitySpan[] = [];
  const usedRanges: Array<[number, number]> = [];
  let group: TokenGroup | null = null;

  const flush = () => {
    if (group) {
      const span = finalizeGroup(group, text, usedRanges);
      if (span) spans.push(span);
      group = null;
    }
  };

  for (const token of tokens) {
    const label = parseLabel(token.entity);
    if (!label) {
      flush();
      continue;
    }

    const isSubword = token.word.startsWith('##');
    const current: TokenGroup | null = group;
    const startsNew =
      !current ||
      current.label !== label ||
      token.index > current.lastIdx + 1 ||
      (token.entity.startsWith('B-') && !isSubword);

    if (startsNew || !current) {
      flush();
      group = { label, pieces: [isSubword ? token.word.slice(2) : token.word], scores: [token.score], lastIdx: token.index };
      continue;
    }

    if (isSubword && current.pieces.length > 0) {
      current.pieces[current.pieces.length - 1] += token.word.slice(2);
    } else {
      current.pieces.push(token.word);
    }
    current.scores.push(token.score);
    current.lastIdx = token.index;
  }

  flush();
  return spans;
}

/** The slice of a token-classification pipeline used for recognition. */
export interface TokenClassifier {
  (text: string): Promise<unknown>;
  tokenizer: {
    model_max_length: number;
    tokenize(text: string): string[];
  };
}

export interface TextWindow {
  offset: number;
  text: string;
}

// BERT-style encoders take at most 512 positions; [CLS] and [SEP] use two of them
const MAX_MODEL_TOKENS = 512;
const SPECIAL_TOKENS = 2;

const SENTENCE_END = /[.!?;:]$/;

interface Word {
  start: number;
  end: number;
  tokens: number;
}

/**
 * Cuts the text into whitespace-aligned windows of at most `maxTokens`
 * tokens each. A window that overflows ends at its last sentence end when
 * it has one. A single word over budget still gets a window of its own.
 */
export function splitIntoWindows(
  text: string,
  maxTokens: number,
  countTokens: (word: string) => number
): TextWindow[] {
  const words: Word[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    words.push({ start, end: start + match[0].length, tokens: Math.max(1, countTokens(match[0])) });
  }

  const windows: TextWindow[] = [];
  let first = 0;

  while (first < words.length) {
    let used = 0;
    let next = first;
    let sentenceEnd = -1;

    while (next < words.length) {
      const word = words[next];
      if (next > first && used + word.tokens > maxTokens) break;
      used += word.tokens;
      if (SENTENCE_END.test(text.slice(word.start, word.end))) sentenceEnd = next;
      next++;
    }

    const cut = next < words.length && sentenceEnd >= first ? sentenceEnd + 1 : next;
    const start = words[first].start;
    windows.push({ offset: start, text: text.slice(start, words[cut - 1].end) });
    first = cut;
  }

  return windows;
}

/**
 * Runs the classifier window by window so long records are read in full,
 * shifting every span back to its position in the whole text.
 */
export async function runRecognition(classifier: TokenClassifier, text: string): Promise<EntitySpan[]> {
  const { tokenizer } = classifier;
  const budget = Math.min(tokenizer.model_max_length, MAX_MODEL_TOKENS) - SPECIAL_TOKENS;
  const spans: EntitySpan[] = [];

  for (const window of splitIntoWindows(text, budget, (word) => tokenizer.tokenize(word).length)) {
    const output: unknown = await classifier(window.text);

    for (const span of groupEntitySpans(rawTokensSchema.parse(output), window.text)) {
      spans.push({ ...span, start: span.start + window.offset, end: span.end + window.offset });
    }
  }

  return spans;
}

export interface LazyEntityRecognizer extends EntityRecognizer {
  readonly modelId: string;
  /** Loads the model now instead of on the first recognize() call. */
  warm(): Promise<void>;
  isLoaded(): boolean;
}

/** Recognizer backed by the process-wide model, loaded on first use. */
export function createLazyRecognizer(modelId: string, options: ModelOptions = {}): LazyEntityRecognizer {
  const session = (): Promise<ModelSession> => loadModel(modelId, options);

  return {
    modelId,
    async recognize(text: string): Promise<EntitySpan[]> {
      const { pipeline } = await session();
      return runRecognition(pipeline, text);
    },
    async warm(): Promise<void> {
      await session();
    },
    isLoaded: isModelLoaded,
  };
}
