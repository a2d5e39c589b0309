import { describe, it, expect } from 'vitest';
import { resolveConflicts } from './conflict-resolver.js';
import type { PatternPiiMapping } from '../../shared/types/pii.types.js';

function mapping(overrides: Partial<PatternPiiMapping>): PatternPiiMapping {
  return { CPF: [], RG: [], EMAIL: [], PHONE: [], ADDRESS: [], ...overrides };
}

describe('resolveConflicts', () => {
  it('gives a shared literal to the earliest type in priority order', () => {
    const result = resolveConflicts(
      mapping({
        CPF: ['11987654321'],
        RG: ['12.345.678-9'],
        PHONE: ['11987654321', '61 99876-5432'],
        ADDRESS: ['12.345.678-9', 'Rua A 1'],
      })
    );

    expect(result).toEqual(
      mapping({
        CPF: ['11987654321'],
        RG: ['12.345.678-9'],
        PHONE: ['61 99876-5432'],
        ADDRESS: ['Rua A 1'],
      })
    );
  });

  it('leaves emails alone', () => {
    const result = resolveConflicts(mapping({ CPF: ['a@b.com'], EMAIL: ['a@b.com'] }));
    expect(result.EMAIL).toEqual(['a@b.com']);
  });

  it('is idempotent', () => {
    const once = resolveConflicts(
      mapping({ CPF: ['111.222.333-44'], PHONE: ['111.222.333-44', '61 3333-4444'], ADDRESS: ['61 3333-4444'] })
    );
    expect(resolveConflicts(once)).toEqual(once);
  });

  it('does not mutate its input', () => {
    const input = mapping({ CPF: ['1'], PHONE: ['1'] });
    resolveConflicts(input);
    expect(input.PHONE).toEqual(['1']);
  });
});
