import { PII_PATTERNS } from './patterns.js';
import { VALIDATORS, type ValidationContext } from './validators.js';
import type { Vocabulary } from '../../infrastructure/config/vocabulary.js';
import type { PatternPiiMapping, PatternPiiType, PiiCandidate } from '../../shared/types/pii.types.js';

/** Every match of the type's patterns, in text order per pattern. */
export function extractCandidates(type: PatternPiiType, text: string): PiiCandidate[] {
  const candidates: PiiCandidate[] = [];

  for (const pattern of PII_PATTERNS[type]) {
    for (const match of text.matchAll(pattern)) {
      candidates.push({ type, value: match[0], offset: match.index ?? 0 });
    }
  }

  return candidates;
}

/**
 * Runs extraction and validation for one type. A literal is kept once,
 * as soon as any of its occurrences passes the validator.
 */
export function extractValidated(type: PatternPiiType, text: string, context: ValidationContext): string[] {
  const validate = VALIDATORS[type];
  const accepted = new Set<string>();

  for (const candidate of extractCandidates(type, text)) {
    if (!accepted.has(candidate.value) && validate(candidate, context)) {
      accepted.add(candidate.value);
    }
  }

  return [...accepted];
}

export function extractPatternPii(text: string, vocabulary: Vocabulary): PatternPiiMapping {
  const context: ValidationContext = { text, vocabulary };

  return {
    CPF: extractValidated('CPF', text, context),
    RG: extractValidated('RG', text, context),
    EMAIL: extractValidated('EMAIL', text, context),
    PHONE: extractValidated('PHONE', text, context),
    ADDRESS: extractValidated('ADDRESS', text, context),
  };
}
