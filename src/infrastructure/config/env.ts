import { z } from 'zod';
import { MODEL_DTYPES } from '../../shared/types/entity.types.js';

const booleanFromString = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (!normalized) return undefined;
    if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'n', 'off'].includes(normalized)) return false;
  }
  return value;
}, z.boolean());

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),

  // Token-classification model with PER/ORG/LOC labels (hub id or local directory)
  MODEL_ID: z.string().min(1).default('Xenova/bert-base-multilingual-cased-ner-hrl'),
  MODEL_DTYPE: z.enum(MODEL_DTYPES).default('q8'),
  MODEL_PRELOAD: booleanFromString.default(true),

  RECOGNIZER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  FAIL_STRATEGY: z.enum(['closed', 'open']).default('closed'),

  MAX_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  RATE_LIMIT_MAX: z.coerce.number().default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export type EnvParseResult =
  | { success: true; env: Env }
  | { success: false; issues: string[] };

export function parseEnv(source: Record<string, string | undefined>): EnvParseResult {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  return { success: true, env: result.data };
}

function loadEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('[ERROR] Environment validation failed:');
    for (const issue of result.issues) {
      console.error(`   - ${issue}`);
    }
    process.exit(1);
  }

  return result.env;
}

export const env = loadEnv();
