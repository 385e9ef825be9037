export * from './types/index.js';
export * from './constants/index.js';
export * from './errors/index.js';
export * from './schemas/test-result.schema.js';
export * from './utils/date.js';
export * from './utils/validation.js';
export * from './utils/logger.js';
