/**
 * @veil/enrichment - Hybrid enrichment pipeline
 *
 * Local analysis, the confidence gate, authorized remote escalation,
 * merge with provenance, schema validation and quarantine.
 */

export * from './analyzers/index.js';

export {
  LabelPolicy,
  loadTaxonomy,
  isLabelTaxonomy,
  containsPhrase,
  buildRemotePayload,
  findForbiddenFields,
  type LabelTaxonomy,
  type RemotePayload,
} from './labels.js';

export {
  ConfidenceGate,
  RoutingSession,
  SessionRegistry,
  type RoutingMode,
  type RoutingState,
  type GateDecision,
} from './confidence-gate.js';

export { JsonlQuarantine, MemoryQuarantine, type QuarantineSink } from './quarantine.js';

export {
  SchemaValidator,
  RECORD_SCHEMAS,
  checkSchema,
  validateAnalysis,
  type ValidationOutcome,
  type BatchValidation,
  type SchemaValidatorOptions,
} from './schema-validator.js';

export {
  ProvenanceRecorder,
  type ProvenanceMeta,
  type ProvenanceRecorderOptions,
} from './provenance.js';

export { RunSummaryCollector, type RunSummaryOptions } from './run-summary.js';

export {
  HybridOrchestrator,
  jsonlSinks,
  type RecordSink,
  type RedactionPair,
  type EscalationSummary,
  type FragmentOutcome,
  type EscalationContext,
  type EscalationOutcome,
  type MergeResult,
  type ProcessOptions,
  type BatchResult,
  type HybridOrchestratorOptions,
} from './orchestrator.js';

export { createPipeline, type Pipeline, type PipelineOptions } from './pipeline.js';
