import type { FastifyInstance } from 'fastify';

import { policyQuerySchema, queryToOverrides } from './schemas.js';

export async function quarantineRoutes(fastify: FastifyInstance) {
  // GET /v1/quarantine - Ordered list of test ids to suppress
  fastify.get('/', async request => {
    const query = policyQuerySchema.parse(request.query);
    const testIds = fastify.flakeService.quarantine(queryToOverrides(query));

    return {
      success: true,
      data: {
        testIds,
        total: testIds.length,
      },
    };
  });
}
