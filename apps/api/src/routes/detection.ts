import { API_ROUTES } from '@flakelens/shared';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { policyQuerySchema, queryToOverrides } from './schemas.js';

const detectQuerySchema = policyQuerySchema.extend({
  flakyOnly: z.enum(['true', 'false']).optional().transform(value => value === 'true'),
});

const trendQuerySchema = policyQuerySchema.extend({
  days: z.coerce.number().int().min(1).optional(),
});

export async function detectionRoutes(fastify: FastifyInstance) {
  // GET /v1/tests - Statistics for every test, most expensive first
  fastify.get(API_ROUTES.TESTS, async request => {
    const query = detectQuerySchema.parse(request.query);
    const statistics = fastify.flakeService.detect(queryToOverrides(query));

    return {
      success: true,
      data: query.flakyOnly ? statistics.filter(entry => entry.isFlaky) : statistics,
    };
  });

  // GET /v1/stats - Summary of the stored history
  fastify.get(API_ROUTES.STATS, async request => {
    const query = policyQuerySchema.parse(request.query);
    return {
      success: true,
      data: fastify.flakeService.stats(queryToOverrides(query)),
    };
  });

  // GET /v1/trends - Failure trend per test over a recent window
  fastify.get(API_ROUTES.TRENDS, async request => {
    const query = trendQuerySchema.parse(request.query);
    return {
      success: true,
      data: fastify.flakeService.trends(query.days, queryToOverrides(query)),
    };
  });
}
