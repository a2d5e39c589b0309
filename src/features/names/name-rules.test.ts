import { describe, it, expect } from 'vitest';
import { cleanPersonName, isValidName, stripHonorifics, stripTrailingNoise, tokenize } from './name-rules.js';
import { getDefaultVocabulary } from '../../infrastructure/config/vocabulary.js';

const vocabulary = getDefaultVocabulary();

describe('name-rules', () => {
  describe('cleanPersonName', () => {
    it('keeps names with connector prepositions', () => {
      expect(cleanPersonName('Maria das Dores de Souza', vocabulary)).toBe('Maria das Dores de Souza');
    });

    it('drops honorific titles at either end', () => {
      expect(cleanPersonName('Dr. Carlos Pereira', vocabulary)).toBe('Carlos Pereira');
      expect(cleanPersonName('Prof. Ana Souza Dra.', vocabulary)).toBe('Ana Souza');
    });

    it('drops trailing document labels', () => {
      expect(cleanPersonName('Ana Souza CPF:', vocabulary)).toBe('Ana Souza');
      expect(cleanPersonName('Ana Souza RG Nome', vocabulary)).toBe('Ana Souza');
    });

    it('collapses whitespace between tokens', () => {
      expect(cleanPersonName('  Joana   Prado ', vocabulary)).toBe('Joana Prado');
    });

    it('excludes spans starting with a formal address', () => {
      expect(cleanPersonName('Vossa Excelência Senhor Fulano', vocabulary)).toBeNull();
      expect(cleanPersonName('Excelentíssimo Senhor Paulo Mendes', vocabulary)).toBeNull();
    });

    it('rejects single given names', () => {
      expect(cleanPersonName('Maria', vocabulary)).toBeNull();
    });

    it('rejects a span that is only a title and a name', () => {
      expect(cleanPersonName('Sra. Maria', vocabulary)).toBeNull();
    });
  });

  describe('isValidName', () => {
    it('rejects spans whose first and last tokens match', () => {
      expect(isValidName(tokenize('João da Silva João'), vocabulary)).toBe(false);
    });

    it('rejects forbidden common nouns anywhere in the name', () => {
      expect(isValidName(tokenize('Maria Associação Silva'), vocabulary)).toBe(false);
    });

    it('rejects spans opening with a possessive pronoun', () => {
      expect(isValidName(tokenize('Nossa Senhora Aparecida'), vocabulary)).toBe(false);
    });

    it('rejects lower-case tokens other than connectors', () => {
      expect(isValidName(tokenize('Carlos pereira'), vocabulary)).toBe(false);
      expect(isValidName(tokenize('Carlos e Pereira'), vocabulary)).toBe(true);
    });

    it('accepts accented capitals', () => {
      expect(isValidName(tokenize('Ábia Éboli'), vocabulary)).toBe(true);
    });

    it('accepts up to seven tokens', () => {
      expect(isValidName(tokenize('Ana Beatriz Carla Dias Elisa Fátima Gomes'), vocabulary)).toBe(true);
      expect(isValidName(tokenize('Ana Beatriz Carla Dias Elisa Fátima Gomes Horta'), vocabulary)).toBe(false);
    });
  });

  describe('stripHonorifics', () => {
    it('keeps titles in the middle of a name', () => {
      expect(stripHonorifics(['Dr.', 'Ana', 'Dr.', 'Lima'], vocabulary)).toEqual(['Ana', 'Dr.', 'Lima']);
    });
  });

  describe('stripTrailingNoise', () => {
    it('stops at the first token that is not noise', () => {
      expect(stripTrailingNoise(['Ana', 'Nome', 'Lima', 'CNH'], vocabulary)).toEqual(['Ana', 'Nome', 'Lima']);
    });
  });
});
