// Cache
export * from './cache/cache-store.js';
export * from './cache/file-cache-store.js';
export * from './cache/memory-cache-store.js';

// Services
export * from './services/retry-policy.js';
export * from './services/upstream-semaphore.js';

// Observability
export * from './observability/metrics.js';

// Types
export * from './types/place.interface.js';
export * from './types/api-response.js';
export * from './types/errors.js';

// Utils
export * from './utils/circuit-breaker.js';
export * from './utils/env-validator.js';
export { default as logger, contextStorage, withLogContext } from './utils/logger.js';
export type { LogContext } from './utils/logger.js';
