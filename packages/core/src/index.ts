/**
 * @veil/core - Core package for Veil
 *
 * Record contracts, error taxonomy, configuration, concurrency
 * primitives and shared utilities.
 */

// Types & Schemas
export * from './types/index.js';

// Errors
export * from './errors.js';

// Configuration
export * from './config/index.js';

// Concurrency
export {
  Mutex,
  Semaphore,
  runPool,
  resolveConcurrency,
  type PoolOptions,
} from './concurrency/index.js';

// IO
export { JsonlWriter } from './io/jsonl.js';

// Utilities
export {
  sleep,
  hash,
  hmac,
  canonicalJson,
  deepFreeze,
  isPlainObject,
  clampUnit,
  nowIso,
  createRunId,
} from './utils/index.js';
