import type { PatternPiiMapping, PatternPiiType } from '../../shared/types/pii.types.js';

/** Earlier types keep a literal that later types also matched. */
export const CONFLICT_PRIORITY: readonly PatternPiiType[] = ['CPF', 'RG', 'PHONE', 'ADDRESS'];

export function resolveConflicts(mapping: PatternPiiMapping): PatternPiiMapping {
  const claimed = new Set<string>();
  const resolved: PatternPiiMapping = { ...mapping };

  for (const type of CONFLICT_PRIORITY) {
    const kept: string[] = [];
    for (const value of mapping[type]) {
      if (!claimed.has(value)) {
        kept.push(value);
        claimed.add(value);
      }
    }
    resolved[type] = kept;
  }

  return resolved;
}
