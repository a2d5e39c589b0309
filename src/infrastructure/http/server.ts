import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Env } from '../config/env.js';
import type { PiiDetectionService } from '../../features/detection/index.js';

export interface RecognizerStatus {
  modelId: string;
  isLoaded(): boolean;
}

export interface ServerDependencies {
  detectionService: PiiDetectionService;
  recognizer: RecognizerStatus;
}

export interface ServerOptions {
  logLevel: Env['LOG_LEVEL'];
  /** Pretty-prints through pino-pretty; plain JSON lines otherwise. */
  prettyLogs: boolean;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

function loggerOptions(options: ServerOptions): FastifyServerOptions['logger'] {
  if (!options.prettyLogs) {
    return { level: options.logLevel };
  }

  return {
    level: options.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

export async function createServer(
  deps: ServerDependencies,
  options: ServerOptions
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: loggerOptions(options),
  });

  // Keyed on the socket address only
  await app.register(rateLimit, {
    max: options.rateLimitMax,
    timeWindow: options.rateLimitWindowMs,
    errorResponseBuilder: (_request, context) =>
      Object.assign(new Error(`Rate limit exceeded, retry in ${context.after}.`), {
        name: 'Too Many Requests',
        statusCode: 429,
      }),
  });

  app.decorate('deps', deps);

  app.get('/health', async () => ({
    status: 'ok',
    model: {
      id: deps.recognizer.modelId,
      loaded: deps.recognizer.isLoaded(),
    },
    timestamp: new Date().toISOString(),
  }));

  app.setErrorHandler((error, _request, reply) => {
    app.log.error(error);

    const statusCode = error.statusCode ?? 500;
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    const message = statusCode >= 500 ? 'Internal Server Error' : errorMessage;

    reply.status(statusCode).send({
      error: error instanceof Error ? error.name : 'Error',
      message,
      statusCode,
    });
  });

  return app;
}

declare module 'fastify' {
  interface FastifyInstance {
    deps: ServerDependencies;
  }
}
