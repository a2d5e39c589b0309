import type { Vocabulary } from '../../infrastructure/config/vocabulary.js';

export const MIN_NAME_TOKENS = 2;
export const MAX_NAME_TOKENS = 7;

const STARTS_UPPERCASE = /^\p{Lu}/u;

export function tokenize(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0);
}

/** Salutations such as "Vossa Excelência" are never names. */
export function startsWithFormalAddress(value: string, vocabulary: Vocabulary): boolean {
  const lower = value.toLowerCase();
  return vocabulary.formalAddressPhrases.some((phrase) => lower.startsWith(phrase));
}

export function stripHonorifics(tokens: string[], vocabulary: Vocabulary): string[] {
  const isTitle = (token: string) => vocabulary.honorificTitles.has(token.toLowerCase());

  let start = 0;
  let end = tokens.length;
  while (start < end && isTitle(tokens[start] ?? '')) start++;
  while (end > start && isTitle(tokens[end - 1] ?? '')) end--;

  return tokens.slice(start, end);
}

/** Drops labels the recognizer glued to the end of a name, e.g. "CPF:". */
export function stripTrailingNoise(tokens: string[], vocabulary: Vocabulary): string[] {
  const result = [...tokens];

  while (result.length > 0) {
    const last = (result[result.length - 1] ?? '').toLowerCase().replace(/^:+|:+$/g, '');
    if (!vocabulary.trailingNoiseTokens.has(last)) break;
    result.pop();
  }

  return result;
}

export function isValidName(tokens: string[], vocabulary: Vocabulary): boolean {
  if (tokens.length < MIN_NAME_TOKENS || tokens.length > MAX_NAME_TOKENS) {
    return false;
  }

  const first = tokens[0] ?? '';
  const last = tokens[tokens.length - 1] ?? '';

  // "Nossa Senhora ...", "Seus Direitos ..."
  if (vocabulary.leadingPronouns.has(first.toLowerCase())) {
    return false;
  }

  if (first === last) {
    return false;
  }

  for (const token of tokens) {
    const lower = token.toLowerCase();

    if (vocabulary.nameConnectors.has(lower)) {
      continue;
    }

    if (vocabulary.forbiddenNameWords.has(lower)) {
      return false;
    }

    if (!STARTS_UPPERCASE.test(token)) {
      return false;
    }
  }

  return true;
}

/** Cleans a recognized person span; null when it is not a usable name. */
export function cleanPersonName(raw: string, vocabulary: Vocabulary): string | null {
  const trimmed = raw.trim();
  if (startsWithFormalAddress(trimmed, vocabulary)) {
    return null;
  }

  const tokens = stripTrailingNoise(stripHonorifics(tokenize(trimmed), vocabulary), vocabulary);
  return isValidName(tokens, vocabulary) ? tokens.join(' ') : null;
}
