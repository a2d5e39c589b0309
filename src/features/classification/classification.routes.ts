import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

export interface ClassificationRouteOptions {
  maxBatchSize: number;
}

const classifyBodySchema = z.object({
  text: z.string(),
});

const batchBodySchema = z.object({
  records: z.array(z.string().nullable()),
});

function badRequest(reply: FastifyReply, message: string): void {
  reply.status(400).send({
    error: 'Bad Request',
    message,
    statusCode: 400,
  });
}

export async function registerClassificationRoutes(
  app: FastifyInstance,
  options: ClassificationRouteOptions
): Promise<void> {
  const { detectionService } = app.deps;

  app.post('/v1/classify', async (request, reply) => {
    const body = classifyBodySchema.safeParse(request.body);

    if (!body.success || !body.data.text.trim()) {
      badRequest(reply, 'Body must include a non-empty "text" field.');
      return;
    }

    reply.send(await detectionService.classify(body.data.text));
  });

  app.post('/v1/classify/batch', async (request, reply) => {
    const body = batchBodySchema.safeParse(request.body);

    if (!body.success) {
      badRequest(reply, 'Body must include a "records" array of strings or nulls.');
      return;
    }

    if (body.data.records.length > options.maxBatchSize) {
      badRequest(reply, `A batch holds at most ${options.maxBatchSize} records.`);
      return;
    }

    const results = await detectionService.classifyBatch(body.data.records);
    request.log.info(
      { received: body.data.records.length, classified: results.length },
      'Batch classified'
    );

    reply.send({ results });
  });
}
