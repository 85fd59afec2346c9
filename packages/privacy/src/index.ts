/**
 * @veil/privacy - Veil's privacy layer
 *
 * Salt store, detector chain, the redaction engine (Policy Shield) and
 * the differential privacy engine with its budget ledger.
 */

export { SaltStore } from './salt-store.js';

export * from './detectors/index.js';

export {
  RedactionEngine,
  normalizeIdentity,
  type RedactionEngineOptions,
  type RedactionResult,
  type RedactManyResult,
  type MappingStats,
} from './redaction-engine.js';

export { MARKER_PATTERN, markerRanges, resolveOverlaps, excludeRanges, overlaps } from './spans.js';

export * from './dp/index.js';
