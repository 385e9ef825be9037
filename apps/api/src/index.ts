/**
 * Public surface of the FlakeLens engine
 */

export * from './analytics/index.js';
export { QuarantineSelector, type QuarantineDecision, type QuarantineExclusion } from './policy/engine.js';
export {
  loadPolicyFile,
  parsePolicy,
  policyConfigSchema,
  policyToOverrides,
  resolveEngineOptions,
  type EngineOverrides,
  type PolicyConfig,
} from './policy/config.js';
export { InMemoryResultStore, WriteLock, type ResultStore } from './ingestion/store.js';
export { JsonFileResultStore } from './ingestion/file-store.js';
export { parseJUnitFile, parseJUnitStream, parseJUnitString } from './ingestion/junit-parser.js';
export {
  FlakeAnalysisService,
  type FlakeAnalysisServiceOptions,
  type ReportIngestOptions,
} from './services/flake-analysis.service.js';
export { buildApp, type BuildAppOptions } from './app.js';
export { loadConfig, type Config } from './config/index.js';
export { logger } from './utils/logger.js';
