import { PII_TYPES, type ClassificationVerdict, type PiiMapping, type PiiType } from '../../shared/types/pii.types.js';

/** Types whose presence alone makes a record non-public. */
export const STRONG_PII_TYPES: readonly PiiType[] = PII_TYPES;

export function classify(
  mapping: PiiMapping,
  strongTypes: readonly PiiType[] = STRONG_PII_TYPES
): ClassificationVerdict {
  return strongTypes.some((type) => mapping[type].length > 0) ? 'non-public' : 'public';
}
