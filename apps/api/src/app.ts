import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { API_ROUTES } from '@flakelens/shared';
import Fastify from 'fastify';

import { config } from './config/index.js';
import analysisPlugin from './plugins/analysis.js';
import errorHandler from './plugins/error-handler.js';
import { detectionRoutes } from './routes/detection.js';
import { healthRoutes } from './routes/health.js';
import { ingestionRoutes } from './routes/ingestion.js';
import { quarantineRoutes } from './routes/quarantine.js';
import type { FlakeAnalysisService } from './services/flake-analysis.service.js';
import { loggerTransport } from './utils/logger.js';

export interface BuildAppOptions {
  service: FlakeAnalysisService;
  /** Disable request logging, e.g. in tests */
  logger?: boolean;
  rateLimit?: boolean;
}

export async function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    logger: options.logger === false
      ? false
      : { level: config.logLevel, transport: loggerTransport },
    trustProxy: true,
  });

  // Register plugins
  await app.register(helmet, {
    contentSecurityPolicy: config.env === 'production',
  });

  await app.register(cors, {
    origin: config.env === 'production' ? config.corsOrigin : true,
  });

  if (options.rateLimit !== false) {
    await app.register(rateLimit, {
      max: config.rateLimitMax,
      timeWindow: config.rateLimitWindow,
    });
  }

  await app.register(errorHandler);
  await app.register(analysisPlugin, { service: options.service });

  // Register routes
  await app.register(healthRoutes, { prefix: API_ROUTES.HEALTH });
  await app.register(ingestionRoutes, { prefix: API_ROUTES.RUNS });
  await app.register(detectionRoutes);
  await app.register(quarantineRoutes, { prefix: API_ROUTES.QUARANTINE });

  return app;
}
