import { FLAKELENS_VERSION } from '@flakelens/shared';
import type { FastifyInstance } from 'fastify';

export async function healthRoutes(fastify: FastifyInstance) {
  // Basic health check endpoint
  fastify.get('/', async () => {
    return {
      status: 'ok' as const,
      version: FLAKELENS_VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      runs: fastify.flakeService.runs().length,
    };
  });
}
