import type { PatternPiiType } from '../../shared/types/pii.types.js';

/** Upper bound on the free text captured after a street keyword. */
export const STREET_FREE_TEXT_MAX = 120;

export const CPF_PATTERN = /\b\d{3}\.?\d{3}\.?\d{3}-?\d{1,2}\b/g;

export const RG_PATTERN = /\b\d{1,2}\.?\d{3}\.?\d{3}-?[0-9Xx]\b/g;

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

// +55, DDD with or without parentheses, optional mobile 9, 8-digit subscriber
export const PHONE_PATTERN = /\b(?:\+55\s?)?(?:\(?\d{2}\)?\s?)?9?\d{4}-?\d{4}\b/g;

export const STREET_PATTERN = new RegExp(
  String.raw`\b(?:Rua|R\.|Avenida|Av\.?|Travessa|Tv\.?|Alameda|Estrada|Rodovia)\s+[A-Za-zÀ-ÿ0-9\s]{3,${STREET_FREE_TEXT_MAX}}`,
  'gi'
);

export const LOT_BLOCK_PATTERN = /\b(?:Qd\.?|Quadra|Lt\.?|Lote|Bloco|BLC|Conjunto|CJ)\s*[A-Za-z0-9-]+\b/gi;

/** Address candidates pool the matches of both sub-patterns. */
export const PII_PATTERNS: Record<PatternPiiType, readonly RegExp[]> = {
  CPF: [CPF_PATTERN],
  RG: [RG_PATTERN],
  EMAIL: [EMAIL_PATTERN],
  PHONE: [PHONE_PATTERN],
  ADDRESS: [STREET_PATTERN, LOT_BLOCK_PATTERN],
};
