import { describe, it, expect } from 'vitest';
import { extractCandidates, extractPatternPii } from './extractors.js';
import { STREET_FREE_TEXT_MAX } from './patterns.js';
import { getDefaultVocabulary } from '../../infrastructure/config/vocabulary.js';

const vocabulary = getDefaultVocabulary();

describe('extractors', () => {
  describe('extractCandidates', () => {
    it('records the offset of every match', () => {
      expect(extractCandidates('CPF', 'CPF 123.456.789-09 e 98765432100')).toEqual([
        { type: 'CPF', value: '123.456.789-09', offset: 4 },
        { type: 'CPF', value: '98765432100', offset: 21 },
      ]);
    });

    it('pools street and lot/block matches for addresses', () => {
      const values = extractCandidates('ADDRESS', 'Moro na Quadra 5 Lote 12').map((c) => c.value);
      expect(values).toEqual(['Quadra 5', 'Lote 12']);
    });

    it('bounds the free text after a street keyword', () => {
      const [candidate] = extractCandidates('ADDRESS', `Rua ${'a'.repeat(300)} 1`);
      expect(candidate?.value).toBe(`Rua ${'a'.repeat(STREET_FREE_TEXT_MAX)}`);
    });

    it('extracts email addresses', () => {
      const values = extractCandidates('EMAIL', 'Escreva para joao_silva+sic@orgao.gov.br hoje').map((c) => c.value);
      expect(values).toEqual(['joao_silva+sic@orgao.gov.br']);
    });

    it('returns nothing when no pattern matches', () => {
      expect(extractCandidates('PHONE', 'sem números aqui')).toEqual([]);
    });
  });

  describe('extractPatternPii', () => {
    it('keeps only validated values, once each', () => {
      const result = extractPatternPii('CPF 123.456.789-09, de novo 123.456.789-09 e 123.456.789-0', vocabulary);
      expect(result.CPF).toEqual(['123.456.789-09']);
    });

    it('finds RG context after characters whose lower case is longer', () => {
      const result = extractPatternPii(`${'İ'.repeat(20)} RG 13.456.789-0`, vocabulary);
      expect(result.RG).toEqual(['13.456.789-0']);
    });

    it('accepts an RG literal when any occurrence has context', () => {
      const result = extractPatternPii('Processo 13.456.789-0, RG 13.456.789-0', vocabulary);
      expect(result.RG).toEqual(['13.456.789-0']);
    });

    it('validates both address sub-patterns', () => {
      const result = extractPatternPii('Moro na Quadra 5 Lote 12', vocabulary);
      expect(result.ADDRESS).toEqual(['Quadra 5', 'Lote 12']);
    });

    it('drops phone matches with an invalid area code', () => {
      expect(extractPatternPii('Ligue 05 9876-5432', vocabulary).PHONE).toEqual([]);
      expect(extractPatternPii('Telefone 61 99876-5432', vocabulary).PHONE).toEqual(['61 99876-5432']);
    });
  });
});
