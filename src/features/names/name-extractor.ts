import { cleanPersonName } from './name-rules.js';
import { PERSON_LABEL, type EntityRecognizer } from '../../shared/types/entity.types.js';
import type { Vocabulary } from '../../infrastructure/config/vocabulary.js';

/**
 * Turns the recognizer's person spans into distinct, cleaned names.
 */
export class NameExtractor {
  private recognizer: EntityRecognizer;
  private vocabulary: Vocabulary;

  constructor(recognizer: EntityRecognizer, vocabulary: Vocabulary) {
    this.recognizer = recognizer;
    this.vocabulary = vocabulary;
  }

  async extract(text: string): Promise<string[]> {
    const spans = await this.recognizer.recognize(text);
    const names = new Set<string>();

    for (const span of spans) {
      if (span.label !== PERSON_LABEL) continue;

      const name = cleanPersonName(span.text, this.vocabulary);
      if (name) {
        names.add(name);
      }
    }

    return [...names];
  }
}
