import { normalize } from './normalize.js';
import { extractPatternPii } from './extractors.js';
import { resolveConflicts } from './conflict-resolver.js';
import { NameExtractor } from '../names/index.js';
import { classify, STRONG_PII_TYPES } from '../classification/classifier.js';
import {
  createEmptyMapping,
  nonEmptyEntries,
  type BatchClassificationReport,
  type ClassificationReport,
  type PiiMapping,
  type PiiType,
} from '../../shared/types/pii.types.js';
import type { EntityRecognizer } from '../../shared/types/entity.types.js';
import type { Vocabulary } from '../../infrastructure/config/vocabulary.js';

export interface DetectionOptions {
  timeoutMs: number;
  failStrategy: 'closed' | 'open';
  strongTypes?: readonly PiiType[];
}

export class RecognizerTimeoutError extends Error {
  readonly statusCode = 504;

  constructor(timeoutMs: number) {
    super(`Entity recognition timeout exceeded: ${timeoutMs}ms`);
    this.name = 'RecognizerTimeoutError';
  }
}

/**
 * Runs the detection pipeline over one record and classifies it.
 */
export class PiiDetectionService {
  private recognizer: EntityRecognizer;
  private nameExtractor: NameExtractor;
  private vocabulary: Vocabulary;
  private options: DetectionOptions;

  constructor(recognizer: EntityRecognizer, vocabulary: Vocabulary, options: DetectionOptions) {
    this.recognizer = recognizer;
    this.nameExtractor = new NameExtractor(recognizer, vocabulary);
    this.vocabulary = vocabulary;
    this.options = options;
  }

  /**
   * Builds the full PII mapping: pattern types are conflict-resolved first,
   * person names are merged last and left out of that resolution.
   */
  async detect(text: string): Promise<PiiMapping> {
    const normalized = normalize(text);
    if (!normalized) {
      return createEmptyMapping();
    }

    const patternPii = resolveConflicts(extractPatternPii(normalized, this.vocabulary));
    const names = await this.extractNames(normalized);

    return { ...patternPii, PERSON: names };
  }

  async classify(text: string): Promise<ClassificationReport> {
    const mapping = await this.detect(text);

    return {
      verdict: classify(mapping, this.options.strongTypes ?? STRONG_PII_TYPES),
      pii: nonEmptyEntries(mapping),
    };
  }

  /** Blank and missing records are skipped; each report keeps its input index. */
  async classifyBatch(records: ReadonlyArray<string | null | undefined>): Promise<BatchClassificationReport[]> {
    const reports: BatchClassificationReport[] = [];

    for (const [index, record] of records.entries()) {
      if (typeof record !== 'string' || record.trim().length === 0) {
        continue;
      }
      reports.push({ index, ...(await this.classify(record)) });
    }

    return reports;
  }

  private async extractNames(text: string): Promise<string[]> {
    // Model loading is not inference: it runs outside the timeout and its errors propagate
    await this.recognizer.warm?.();

    try {
      return await this.runWithTimeout(this.nameExtractor.extract(text), this.options.timeoutMs);
    } catch (error) {
      if (error instanceof RecognizerTimeoutError && this.options.failStrategy === 'open') {
        console.warn('[WARN] Entity recognition timeout - continuing without names (fail-open mode)');
        return [];
      }
      throw error;
    }
  }

  private async runWithTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new RecognizerTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([promise, timeoutPromise]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
