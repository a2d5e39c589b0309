export const PII_TYPES = ['CPF', 'RG', 'EMAIL', 'PHONE', 'ADDRESS', 'PERSON'] as const;

export type PiiType = (typeof PII_TYPES)[number];

/** Types found by pattern matching; PERSON comes from the entity recognizer. */
export type PatternPiiType = Exclude<PiiType, 'PERSON'>;

export interface PiiCandidate {
  type: PatternPiiType;
  value: string;
  offset: number;
}

/** One list per type, always all six present. */
export type PiiMapping = Record<PiiType, string[]>;

export type PatternPiiMapping = Record<PatternPiiType, string[]>;

export type ClassificationVerdict = 'non-public' | 'public';

export interface ClassificationReport {
  verdict: ClassificationVerdict;
  pii: Partial<PiiMapping>;
}

export interface BatchClassificationReport extends ClassificationReport {
  index: number;
}

export function createEmptyMapping(): PiiMapping {
  return {
    CPF: [],
    RG: [],
    EMAIL: [],
    PHONE: [],
    ADDRESS: [],
    PERSON: [],
  };
}

export function nonEmptyEntries(mapping: PiiMapping): Partial<PiiMapping> {
  const result: Partial<PiiMapping> = {};
  for (const type of PII_TYPES) {
    if (mapping[type].length > 0) {
      result[type] = mapping[type];
    }
  }
  return result;
}
