import 'dotenv/config';
import { env } from './infrastructure/config/env.js';
import { getDefaultVocabulary } from './infrastructure/config/vocabulary.js';
import { createServer } from './infrastructure/http/server.js';
import { createLazyRecognizer } from './engine/entity-recognizer.js';
import { PiiDetectionService } from './features/detection/index.js';
import { registerClassificationRoutes } from './features/classification/index.js';

async function bootstrap(): Promise<void> {
  console.log('[INFO] Starting e-SIC PII Classifier...\n');

  try {
    console.log('[INIT] Phase 1: Loading Vocabulary\n');
    const vocabulary = getDefaultVocabulary();

    console.log('[INIT] Phase 2: Preparing Entity Recognizer\n');
    const recognizer = createLazyRecognizer(env.MODEL_ID, {
      dtype: env.MODEL_DTYPE,
    });
    if (env.MODEL_PRELOAD) {
      await recognizer.warm();
    } else {
      console.log('[INFO] Model preload disabled, loading on first request');
    }

    console.log('\n[INIT] Phase 3: Initializing Services\n');
    const detectionService = new PiiDetectionService(recognizer, vocabulary, {
      timeoutMs: env.RECOGNIZER_TIMEOUT_MS,
      failStrategy: env.FAIL_STRATEGY,
    });

    console.log('[INIT] Phase 4: Starting HTTP Server\n');
    const app = await createServer(
      { detectionService, recognizer },
      {
        logLevel: env.LOG_LEVEL,
        prettyLogs: true,
        rateLimitMax: env.RATE_LIMIT_MAX,
        rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS,
      }
    );

    await registerClassificationRoutes(app, { maxBatchSize: env.MAX_BATCH_SIZE });

    await app.listen({ port: env.PORT, host: env.HOST });

    console.log(`\n[OK] e-SIC PII Classifier running at http://${env.HOST}:${env.PORT}`);
    console.log(`   Model: ${env.MODEL_ID}`);
    console.log(`   Fail Strategy: ${env.FAIL_STRATEGY}`);
    console.log(`   Rate Limit: ${env.RATE_LIMIT_MAX} req/${env.RATE_LIMIT_WINDOW_MS}ms\n`);

    const shutdown = async (signal: string) => {
      console.log(`\n${signal} received. Shutting down gracefully...`);
      await app.close();
      console.log('[INFO] Goodbye!');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    console.error('[ERROR] Failed to start:', error);
    process.exit(1);
  }
}

void bootstrap();
