export interface EntitySpan {
  text: string;
  /** Category without the B-/I- prefix, e.g. PER, ORG, LOC. */
  label: string;
  start: number;
  end: number;
  score: number;
}

/** Named-entity recognizer consumed by the name extractor. */
export interface EntityRecognizer {
  recognize(text: string): Promise<EntitySpan[]>;
  /** Finishes any one-time setup so that recognize() only runs inference. */
  warm?(): Promise<void>;
}

export const PERSON_LABEL = 'PER';

/** Weight precisions transformers.js can load. */
export const MODEL_DTYPES = ['auto', 'fp32', 'fp16', 'q8', 'int8', 'uint8', 'q4', 'bnb4', 'q4f16'] as const;

export type ModelDtype = (typeof MODEL_DTYPES)[number];
