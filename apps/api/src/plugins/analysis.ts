/**
 * Analysis plugin
 *
 * Decorates the Fastify instance with the flake analysis service.
 */

import type { FastifyInstance } from 'fastify';
import fastifyPlugin from 'fastify-plugin';

import type { FlakeAnalysisService } from '../services/flake-analysis.service.js';
import { logger } from '../utils/logger.js';

declare module 'fastify' {
  interface FastifyInstance {
    flakeService: FlakeAnalysisService;
  }
}

export interface AnalysisPluginOptions {
  service: FlakeAnalysisService;
}

async function analysisPlugin(fastify: FastifyInstance, options: AnalysisPluginOptions) {
  fastify.decorate('flakeService', options.service);
  logger.debug('Analysis service plugin registered');
}

export default fastifyPlugin(analysisPlugin, {
  name: 'analysis',
});
