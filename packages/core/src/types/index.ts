/**
 * @veil/core - Record contracts as TypeBox schemas
 *
 * Fragment, redaction, enrichment, merge, provenance, quarantine and
 * run summary types. Every emitted record is checked against these.
 */

import { Type, type Static } from '@sinclair/typebox';

const Unit = (description?: string) =>
  Type.Number({ minimum: 0, maximum: 1, ...(description ? { description } : {}) });

const IsoTimestamp = Type.String({
  pattern: '^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?Z$',
  description: 'UTC ISO-8601',
});

// ---------------------------------------------------------------------------
// Fragment
// ---------------------------------------------------------------------------

export const FragmentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  conversationId: Type.String({ minLength: 1 }),
  sessionId: Type.String({ minLength: 1 }),
  text: Type.String(),
  timestamp: IsoTimestamp,
  sender: Type.Optional(Type.String()),
  attachments: Type.Optional(Type.Array(Type.String())),
  metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});
export type Fragment = Static<typeof FragmentSchema>;

export const RedactedFragmentSchema = Type.Object({
  fragmentId: Type.String({ minLength: 1 }),
  conversationId: Type.String({ minLength: 1 }),
  sessionId: Type.String({ minLength: 1 }),
  text: Type.String(),
  timestamp: IsoTimestamp,
  detectorVersion: Type.String(),
});
export type RedactedFragment = Static<typeof RedactedFragmentSchema>;

// ---------------------------------------------------------------------------
// Redaction report
// ---------------------------------------------------------------------------

export const RedactionReportSchema = Type.Object({
  fragmentId: Type.String(),
  coverage: Unit('Fraction of detected sensitive spans that were redacted'),
  strict: Type.Boolean(),
  requiredCoverage: Unit(),
  hardfailTriggered: Type.Boolean(),
  hardfailClasses: Type.Array(Type.String()),
  spansDetected: Type.Integer({ minimum: 0 }),
  spansRedacted: Type.Integer({ minimum: 0 }),
  classCounts: Type.Record(Type.String(), Type.Integer({ minimum: 0 })),
  detectorVersion: Type.String(),
  notes: Type.Array(Type.String()),
});
export type RedactionReport = Static<typeof RedactionReportSchema>;

// ---------------------------------------------------------------------------
// Enrichment
// ---------------------------------------------------------------------------

export const SpeechActSchema = Type.Union([
  Type.Literal('ask'),
  Type.Literal('inform'),
  Type.Literal('promise'),
  Type.Literal('refuse'),
  Type.Literal('apologize'),
  Type.Literal('propose'),
  Type.Literal('meta'),
]);
export type SpeechAct = Static<typeof SpeechActSchema>;

export const EmotionSchema = Type.Union([
  Type.Literal('joy'),
  Type.Literal('anger'),
  Type.Literal('fear'),
  Type.Literal('sadness'),
  Type.Literal('disgust'),
  Type.Literal('surprise'),
  Type.Literal('neutral'),
]);
export type Emotion = Static<typeof EmotionSchema>;

export const StanceSchema = Type.Union([
  Type.Literal('supportive'),
  Type.Literal('neutral'),
  Type.Literal('challenging'),
]);
export type Stance = Static<typeof StanceSchema>;

export const SourceSchema = Type.Union([Type.Literal('local'), Type.Literal('remote')]);
export type Source = Static<typeof SourceSchema>;

/** Semantic fields shared by local and remote analysis. */
export const AnalysisSchema = Type.Object({
  speechAct: SpeechActSchema,
  emotionPrimary: EmotionSchema,
  stance: StanceSchema,
  intent: Type.String({ maxLength: 200 }),
  coarseLabels: Type.Array(Type.String()),
  confidenceLlm: Unit('Model confidence in the analysis'),
});
export type Analysis = Static<typeof AnalysisSchema>;

export const EnrichmentRecordSchema = Type.Composite([
  Type.Object({
    fragmentId: Type.String({ minLength: 1 }),
    conversationId: Type.String({ minLength: 1 }),
    sessionId: Type.String({ minLength: 1 }),
  }),
  AnalysisSchema,
  Type.Object({
    fineLabelsLocal: Type.Array(Type.String(), { description: 'LOCAL-ONLY' }),
    source: SourceSchema,
  }),
]);
export type EnrichmentRecord = Static<typeof EnrichmentRecordSchema>;

// ---------------------------------------------------------------------------
// Merge decision
// ---------------------------------------------------------------------------

export const MergeReasonSchema = Type.Union([
  Type.Literal('low_confidence'),
  Type.Literal('validation_failed'),
  Type.Literal('authorization_missing'),
  Type.Literal('coverage_insufficient'),
  Type.Literal('hardfail'),
  Type.Literal('manual'),
  Type.Literal('none'),
  Type.Literal('transport_error'),
  Type.Literal('remote_timeout'),
  Type.Literal('canceled'),
]);
export type MergeReason = Static<typeof MergeReasonSchema>;

export const MergeDecisionSchema = Type.Object({
  sourceLastEnrichment: SourceSchema,
  reason: MergeReasonSchema,
});
export type MergeDecision = Static<typeof MergeDecisionSchema>;

// ---------------------------------------------------------------------------
// Provenance
// ---------------------------------------------------------------------------

export const TokenUsageSchema = Type.Object({
  prompt: Type.Integer({ minimum: 0 }),
  completion: Type.Integer({ minimum: 0 }),
  total: Type.Integer({ minimum: 0 }),
});
export type TokenUsage = Static<typeof TokenUsageSchema>;

export const ProvenanceSchema = Type.Object({
  schemaVersion: Type.String({ minLength: 1 }),
  runId: Type.String({ minLength: 1 }),
  timestamp: IsoTimestamp,
  modelId: Type.String({ minLength: 1 }),
  promptHash: Type.String({ pattern: '^[a-f0-9]{64}$' }),
  sourceHash: Type.String({ pattern: '^[a-f0-9]{64}$' }),
  tokenUsage: TokenUsageSchema,
  latencyMs: Type.Number({ minimum: 0 }),
  cacheHit: Type.Boolean(),
});
export type Provenance = Static<typeof ProvenanceSchema>;

// ---------------------------------------------------------------------------
// Final (emitted) record
// ---------------------------------------------------------------------------

export const FinalRecordSchema = Type.Composite([
  EnrichmentRecordSchema,
  Type.Object({
    confidenceLocal: Unit('Local confidence, kept for audit'),
    decision: MergeDecisionSchema,
    canceled: Type.Boolean(),
    provenance: ProvenanceSchema,
  }),
]);
export type FinalRecord = Static<typeof FinalRecordSchema>;

/** A merged record before provenance is stamped. */
export type MergedRecord = Omit<FinalRecord, 'provenance'>;

// ---------------------------------------------------------------------------
// Quarantine
// ---------------------------------------------------------------------------

export const QuarantineEntrySchema = Type.Object({
  originalRecord: Type.Unknown(),
  errorDetail: Type.Object({
    code: Type.String(),
    message: Type.String(),
    issues: Type.Array(Type.Object({ path: Type.String(), message: Type.String() })),
  }),
  quarantinedAt: IsoTimestamp,
});
export type QuarantineEntry = Static<typeof QuarantineEntrySchema>;

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

export const BudgetSnapshotSchema = Type.Object({
  maxEpsilon: Type.Number(),
  maxDelta: Type.Number(),
  spentEpsilon: Type.Number({ minimum: 0 }),
  accountedDelta: Type.Number({ minimum: 0 }),
  queries: Type.Integer({ minimum: 0 }),
});
export type BudgetSnapshot = Static<typeof BudgetSnapshotSchema>;

export const RunSummarySchema = Type.Object({
  runId: Type.String(),
  startedAt: IsoTimestamp,
  finishedAt: IsoTimestamp,
  fragmentsTotal: Type.Integer({ minimum: 0 }),
  emitted: Type.Integer({ minimum: 0 }),
  quarantined: Type.Integer({ minimum: 0 }),
  /** Quarantine writes, including rejected remote answers. */
  quarantineEntries: Type.Integer({ minimum: 0 }),
  hardfails: Type.Integer({ minimum: 0 }),
  canceled: Type.Integer({ minimum: 0 }),
  coverage: Type.Object({ min: Unit(), max: Unit(), mean: Unit() }),
  escalations: Type.Object({
    attempted: Type.Integer({ minimum: 0 }),
    succeeded: Type.Integer({ minimum: 0 }),
    byReason: Type.Record(Type.String(), Type.Integer({ minimum: 0 })),
  }),
  budget: Type.Union([BudgetSnapshotSchema, Type.Null()]),
});
export type RunSummary = Static<typeof RunSummarySchema>;
