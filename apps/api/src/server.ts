import { buildApp } from './app.js';
import { config } from './config/index.js';
import { JsonFileResultStore } from './ingestion/file-store.js';
import { loadPolicyFile, policyToOverrides } from './policy/config.js';
import { FlakeAnalysisService } from './services/flake-analysis.service.js';
import { logger } from './utils/logger.js';

async function start() {
  try {
    const store = await JsonFileResultStore.open(config.storePath);
    const policy = await loadPolicyFile(config.policyFile);

    const service = new FlakeAnalysisService(store, {
      defaults: policy ? [policyToOverrides(policy), config.engine] : [config.engine],
    });

    const app = await buildApp({ service });

    await app.listen({
      port: config.port,
      host: config.host,
    });

    logger.info(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
