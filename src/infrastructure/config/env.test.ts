import { describe, it, expect } from 'vitest';
import { parseEnv } from './env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const result = parseEnv({});

    expect(result).toMatchObject({
      success: true,
      env: {
        PORT: 3000,
        MODEL_ID: 'Xenova/bert-base-multilingual-cased-ner-hrl',
        MODEL_DTYPE: 'q8',
        MODEL_PRELOAD: true,
        RECOGNIZER_TIMEOUT_MS: 5000,
        FAIL_STRATEGY: 'closed',
        MAX_BATCH_SIZE: 500,
      },
    });
  });

  it('reads booleans and numbers from strings', () => {
    const result = parseEnv({ MODEL_DTYPE: 'fp32', MODEL_PRELOAD: 'no', PORT: '8080' });

    expect(result).toMatchObject({
      success: true,
      env: { MODEL_DTYPE: 'fp32', MODEL_PRELOAD: false, PORT: 8080 },
    });
  });

  it('lists invalid variables', () => {
    const result = parseEnv({ FAIL_STRATEGY: 'maybe', MAX_BATCH_SIZE: '0' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues.map((issue) => issue.split(':')[0])).toEqual(['FAIL_STRATEGY', 'MAX_BATCH_SIZE']);
    }
  });
});
