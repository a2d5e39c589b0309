import path from 'node:path';
import { pipeline, env as transformersEnv, type TokenClassificationPipeline } from '@huggingface/transformers';
import type { ModelDtype } from '../shared/types/entity.types.js';

export interface ModelSession {
  modelId: string;
  pipeline: TokenClassificationPipeline;
}

export interface ModelOptions {
  dtype?: ModelDtype;
}

export class ModelLoadError extends Error {
  readonly statusCode = 503;

  constructor(modelId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load entity recognition model "${modelId}": ${reason}`, { cause });
    this.name = 'ModelLoadError';
  }
}

let sessionPromise: Promise<ModelSession> | null = null;
let loadedSession: ModelSession | null = null;

/** Points transformers.js at a local model directory and returns the name to load. */
function resolveModelId(modelId: string): string {
  const isLocalPath = modelId.startsWith('./') || modelId.startsWith('/');
  if (!isLocalPath) {
    return modelId;
  }

  const absolutePath = path.resolve(modelId);
  transformersEnv.localModelPath = path.dirname(absolutePath) + '/';
  transformersEnv.allowLocalModels = true;
  transformersEnv.allowRemoteModels = false;
  return path.basename(absolutePath);
}

async function initialize(modelId: string, options: ModelOptions): Promise<ModelSession> {
  console.log(`[INFO] Loading entity recognition model: ${modelId}...`);
  const dtype = options.dtype ?? 'q8';
  console.log(`[INFO] Weights dtype: ${dtype}`);
  console.log('   (First run will download and cache the model)');
  const startTime = Date.now();

  try {
    const instance = await pipeline('token-classification', resolveModelId(modelId), {
      dtype,
    }) as TokenClassificationPipeline;

    console.log(`[OK] Model loaded in ${Date.now() - startTime}ms`);
    loadedSession = { modelId, pipeline: instance };
    return loadedSession;
  } catch (error) {
    throw new ModelLoadError(modelId, error);
  }
}

/**
 * Initializes the token classification pipeline once per process.
 * Later calls share the same promise, including a failed one: a model that
 * could not load is never retried.
 */
export function loadModel(modelId: string, options: ModelOptions = {}): Promise<ModelSession> {
  if (sessionPromise) {
    if (loadedSession && loadedSession.modelId !== modelId) {
      console.warn(`[WARN] Model ${loadedSession.modelId} already loaded, ignoring ${modelId}`);
    }
    return sessionPromise;
  }

  sessionPromise = initialize(modelId, options);
  return sessionPromise;
}

export function isModelLoaded(): boolean {
  return loadedSession !== null;
}
