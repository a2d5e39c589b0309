import type { Vocabulary } from '../../infrastructure/config/vocabulary.js';
import type { PatternPiiType, PiiCandidate } from '../../shared/types/pii.types.js';

/** Characters before an RG match that must name the document. */
export const RG_CONTEXT_WINDOW = 15;

export interface ValidationContext {
  /** Normalized text the candidate offsets point into. */
  text: string;
  vocabulary: Vocabulary;
}

export type CandidateValidator = (candidate: PiiCandidate, context: ValidationContext) => boolean;

function digitsOf(value: string): string {
  return value.replace(/\D/g, '');
}

// Format only: check digits are not verified
export function isValidCpf(value: string): boolean {
  return digitsOf(value).length === 11;
}

export function isValidRg(candidate: PiiCandidate, context: ValidationContext): boolean {
  const digits = digitsOf(candidate.value);
  if (digits.length < 7 || digits.length > 9) {
    return false;
  }

  // Slice before lower-casing: case mapping can change the string length
  const window = context.text
    .slice(Math.max(0, candidate.offset - RG_CONTEXT_WINDOW), candidate.offset)
    .toLowerCase();
  return context.vocabulary.rgContextKeywords.some((keyword) => window.includes(keyword));
}

export function isValidPhone(value: string): boolean {
  const digits = digitsOf(value);
  if (digits.length !== 10 && digits.length !== 11) {
    return false;
  }

  const ddd = Number(digits.slice(0, 2));
  return ddd >= 11 && ddd <= 99;
}

export function isValidAddress(value: string, keywords: readonly string[]): boolean {
  const lower = value.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword)) && /\d/.test(value);
}

export const VALIDATORS: Record<PatternPiiType, CandidateValidator> = {
  CPF: (candidate) => isValidCpf(candidate.value),
  RG: isValidRg,
  EMAIL: () => true,
  PHONE: (candidate) => isValidPhone(candidate.value),
  ADDRESS: (candidate, context) => isValidAddress(candidate.value, context.vocabulary.addressKeywords),
};
