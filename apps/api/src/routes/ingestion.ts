import { ingestRunRequestSchema, type ApiResponse, type RunRecord } from '@flakelens/shared';
import type { FastifyInstance } from 'fastify';

export async function ingestionRoutes(fastify: FastifyInstance) {
  // POST /v1/runs - Ingest the normalized results of one CI run
  fastify.post('/', async (request, reply) => {
    const body = ingestRunRequestSchema.parse(request.body);

    const run = await fastify.flakeService.ingest(body.runId, body.results, {
      timestamp: body.timestamp,
      costPerRunUsd: body.costPerRunUsd,
      source: body.source,
    });

    return reply.status(201).send({
      success: true,
      data: run,
    });
  });

  // GET /v1/runs - Run metadata in ingestion order
  fastify.get('/', async (): Promise<ApiResponse<readonly RunRecord[]>> => {
    return {
      success: true,
      data: fastify.flakeService.runs(),
    };
  });
}
