/**
 * @veil/enrichment - HybridOrchestrator
 *
 * Per fragment:
 *   redact -> local analysis -> gate -> (maybe) remote analysis -> merge
 *   -> provenance -> validate -> emit
 *
 * Fragments run on a bounded local pool; remote calls share a smaller
 * semaphore. A run-level AbortSignal stops new remote calls, lets
 * in-flight local work finish (tagged `canceled`), and turns unstarted
 * fragments into `canceled` outcomes.
 */

import { join } from 'node:path';
import pino from 'pino';
import {
  CoverageInsufficient,
  HardFailContentDetected,
  SchemaValidationError,
  Semaphore,
  canonicalJson,
  resolveConcurrency,
  runPool,
  JsonlWriter,
  type EnrichmentRecord,
  type FinalRecord,
  type Fragment,
  type MergeDecision,
  type MergeReason,
  type MergedRecord,
  type RedactedFragment,
  type RedactionReport,
  type RunSummary,
  type TokenUsage,
  type VeilConfig,
} from '@veil/core';
import type { RedactionEngine, PrivacyBudget } from '@veil/privacy';
import { RemoteCaller, RemoteCallError, RetryPolicy } from '@veil/fallback';
import { ConfidenceGate, SessionRegistry, type GateDecision } from './confidence-gate.js';
import { LabelPolicy, buildRemotePayload, findForbiddenFields, type RemotePayload } from './labels.js';
import {
  estimateTokens,
  type LocalAnalyzer,
  type RemoteAnalyzer,
  type RemoteResponse,
} from './analyzers/types.js';
import { SchemaValidator, validateAnalysis } from './schema-validator.js';
import { ProvenanceRecorder, type ProvenanceMeta } from './provenance.js';
import { RunSummaryCollector } from './run-summary.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecordSink<T> {
  append(entry: T): Promise<void>;
}

export interface RedactionPair {
  fragment: RedactedFragment;
  report: RedactionReport;
}

export interface EscalationSummary {
  reason: MergeReason;
  /** A remote call was issued. */
  attempted: boolean;
  /** A valid remote record was produced. */
  succeeded: boolean;
  attempts: number;
  /** The remote answer failed validation and went to quarantine. */
  quarantined: boolean;
}

export type FragmentOutcome =
  | {
      status: 'emitted';
      fragmentId: string;
      record: Readonly<FinalRecord>;
      report: RedactionReport;
      escalation: EscalationSummary;
    }
  | {
      status: 'quarantined';
      fragmentId: string;
      error: SchemaValidationError;
      report: RedactionReport;
      escalation: EscalationSummary;
    }
  | {
      status: 'hardfail';
      fragmentId: string;
      report: RedactionReport;
      classes: string[];
      escalation?: undefined;
    }
  | {
      status: 'canceled';
      fragmentId: string;
      report?: undefined;
      escalation?: undefined;
    };

export interface EscalationContext {
  fragment: RedactedFragment;
  /** Gate output; false means no escalation is wanted. */
  wantsRemote: boolean;
  /** Caller forces a remote pass regardless of confidence. */
  manual?: boolean;
  signal?: AbortSignal;
}

export interface EscalationOutcome {
  record: EnrichmentRecord | null;
  reason: MergeReason;
  attempts: number;
  /** The remote answer was written to quarantine. */
  quarantined?: boolean;
  /** Set when a remote call was issued. */
  remote?: {
    modelId: string;
    prompt: string;
    tokenUsage: TokenUsage;
    latencyMs: number;
    cacheHit: boolean;
  };
}

export interface MergeResult {
  record: MergedRecord;
  decision: MergeDecision;
}

export interface ProcessOptions {
  /** Overrides `remote.authorized` for this call. */
  authorized?: boolean;
  manual?: boolean;
  signal?: AbortSignal;
}

export interface BatchResult {
  outcomes: FragmentOutcome[];
  summary: RunSummary;
}

export interface HybridOrchestratorOptions {
  config: VeilConfig;
  redactor: RedactionEngine;
  localAnalyzer: LocalAnalyzer;
  remoteAnalyzer?: RemoteAnalyzer;
  validator?: SchemaValidator;
  provenance?: ProvenanceRecorder;
  labels?: LabelPolicy;
  remoteCaller?: RemoteCaller;
  /** Reported in the run summary. */
  budget?: PrivacyBudget;
  sinks?: {
    records?: RecordSink<FinalRecord>;
    redactions?: RecordSink<RedactionPair>;
  };
  logger?: pino.Logger;
}

interface LocalRun {
  record: EnrichmentRecord;
  latencyMs: number;
}

const REMOTE_CACHE_LIMIT = 1000;

function isPresent<T>(value: T | undefined): value is T {
  return value !== undefined;
}

// ---------------------------------------------------------------------------
// HybridOrchestrator
// ---------------------------------------------------------------------------

export class HybridOrchestrator {
  readonly sessions: SessionRegistry;
  readonly validator: SchemaValidator;
  readonly provenance: ProvenanceRecorder;

  private readonly config: VeilConfig;
  private readonly redactor: RedactionEngine;
  private readonly localAnalyzer: LocalAnalyzer;
  private readonly remoteAnalyzer?: RemoteAnalyzer;
  private readonly labels: LabelPolicy;
  private readonly caller: RemoteCaller;
  private readonly remoteSlots: Semaphore;
  private readonly budget?: PrivacyBudget;
  private readonly sinks: NonNullable<HybridOrchestratorOptions['sinks']>;
  private readonly remoteCache = new Map<string, EnrichmentRecord>();
  private readonly log: pino.Logger;

  constructor(options: HybridOrchestratorOptions) {
    const { config } = options;
    this.config = config;
    this.log = options.logger ?? pino({ name: '@veil/enrichment' });
    this.redactor = options.redactor;
    this.localAnalyzer = options.localAnalyzer;
    this.remoteAnalyzer = options.remoteAnalyzer;
    this.labels = options.labels ?? new LabelPolicy();
    this.sessions = new SessionRegistry(new ConfidenceGate(config.gate), this.log);
    this.validator = options.validator ?? new SchemaValidator({ logger: this.log });
    this.provenance = options.provenance ?? new ProvenanceRecorder({ schemaVersion: config.output.schemaVersion });
    this.caller = options.remoteCaller ?? new RemoteCaller({
      timeoutMs: config.remote.timeoutMs,
      retryPolicy: new RetryPolicy({
        maxAttempts: config.remote.maxAttempts,
        baseDelayMs: config.remote.backoffBaseMs,
        maxDelayMs: config.remote.backoffMaxMs,
      }),
      logger: this.log,
    });
    this.remoteSlots = new Semaphore(config.remote.concurrency);
    this.budget = options.budget;
    this.sinks = options.sinks ?? {};
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  /** On-device analysis of a redacted fragment. */
  async runLocal(fragment: RedactedFragment, report: RedactionReport): Promise<EnrichmentRecord> {
    return (await this.timedLocal(fragment, report)).record;
  }

  /**
   * Escalate to the remote analyzer when wanted and every precondition
   * holds. Refusals and failures return a null record with the reason.
   */
  async maybeEscalate(
    local: EnrichmentRecord,
    report: RedactionReport,
    authorized: boolean,
    context: EscalationContext,
  ): Promise<EscalationOutcome> {
    const wanted = context.wantsRemote || context.manual === true;
    if (!wanted) return { record: null, reason: 'none', attempts: 0 };

    if (report.hardfailTriggered) return { record: null, reason: 'hardfail', attempts: 0 };
    if (!authorized) return { record: null, reason: 'authorization_missing', attempts: 0 };
    if (report.coverage < report.requiredCoverage) {
      const refusal = new CoverageInsufficient(report.coverage, report.requiredCoverage);
      this.log.info({ fragmentId: local.fragmentId, code: refusal.code }, refusal.message);
      return { record: null, reason: 'coverage_insufficient', attempts: 0 };
    }
    if (context.signal?.aborted) return { record: null, reason: 'canceled', attempts: 0 };

    const remote = this.remoteAnalyzer;
    if (!remote) {
      this.log.warn({ fragmentId: local.fragmentId }, 'Escalation wanted but no remote analyzer is configured');
      return { record: null, reason: 'transport_error', attempts: 0 };
    }

    const payload = buildRemotePayload(context.fragment, local, this.labels, this.config.output.schemaVersion);
    const violations = findForbiddenFields(payload, this.labels);
    if (violations.length > 0) {
      this.log.error({ fragmentId: local.fragmentId, violations }, 'Remote payload carries local-only fields');
      return { record: null, reason: 'validation_failed', attempts: 0 };
    }

    const successReason: MergeReason = context.manual ? 'manual' : 'low_confidence';
    const prompt = canonicalJson(payload);

    const cached = this.remoteCache.get(prompt);
    if (cached) {
      return {
        record: cached,
        reason: successReason,
        attempts: 0,
        remote: { modelId: remote.modelId, prompt, tokenUsage: usage(0, 0), latencyMs: 0, cacheHit: true },
      };
    }

    return this.remoteSlots.run(() => this.callRemote(remote, payload, prompt, local, successReason, context.signal));
  }

  /**
   * Combine local and remote results. Remote semantics win when present;
   * the local confidence is always kept for audit.
   */
  merge(local: EnrichmentRecord, escalation: EscalationOutcome): MergeResult {
    const winner = escalation.record ?? local;
    return {
      record: {
        ...winner,
        coarseLabels: [...winner.coarseLabels],
        fineLabelsLocal: [...local.fineLabelsLocal],
        confidenceLocal: local.confidenceLlm,
        decision: {
          sourceLastEnrichment: escalation.record ? 'remote' : 'local',
          reason: escalation.reason,
        },
        canceled: false,
      },
      decision: {
        sourceLastEnrichment: escalation.record ? 'remote' : 'local',
        reason: escalation.reason,
      },
    };
  }

  // -------------------------------------------------------------------------
  // Pipeline
  // -------------------------------------------------------------------------

  async processFragment(fragment: Fragment, options: ProcessOptions = {}): Promise<FragmentOutcome> {
    const { signal } = options;
    if (signal?.aborted) return { status: 'canceled', fragmentId: fragment.id };

    let redacted: RedactedFragment;
    let report: RedactionReport;
    try {
      ({ fragment: redacted, report } = this.redactor.redact(fragment));
    } catch (err) {
      if (err instanceof HardFailContentDetected) {
        return { status: 'hardfail', fragmentId: fragment.id, report: err.report, classes: err.classes };
      }
      throw err;
    }

    const local = await this.timedLocal(redacted, report);
    const decision: GateDecision = await this.sessions.get(fragment.sessionId).decide(local.record.confidenceLlm);

    const authorized = options.authorized ?? this.config.remote.authorized;
    const escalation = await this.maybeEscalate(local.record, report, authorized, {
      fragment: redacted,
      wantsRemote: decision.wantsRemote,
      manual: options.manual,
      signal,
    });

    const merged = this.merge(local.record, escalation);
    const canceled = signal?.aborted === true;
    const escalationSummary: EscalationSummary = {
      reason: escalation.reason,
      attempted: escalation.attempts > 0,
      succeeded: escalation.record !== null,
      attempts: escalation.attempts,
      quarantined: escalation.quarantined === true,
    };

    let record: Readonly<FinalRecord>;
    try {
      record = this.provenance.attach({ ...merged.record, canceled }, this.provenanceMeta(redacted, local, escalation));
    } catch (err) {
      if (!(err instanceof SchemaValidationError)) throw err;
      await this.validator.quarantineRecord({ ...merged.record, canceled }, err);
      return { status: 'quarantined', fragmentId: fragment.id, error: err, report, escalation: escalationSummary };
    }

    const validation = await this.validator.validateOrQuarantine(record, this.config.output.schemaVersion);
    if (!validation.valid) {
      return {
        status: 'quarantined',
        fragmentId: fragment.id,
        error: validation.error,
        report,
        escalation: escalationSummary,
      };
    }

    await this.sinks.redactions?.append({ fragment: redacted, report });
    await this.sinks.records?.append(record);

    this.log.debug(
      {
        fragmentId: fragment.id,
        source: record.source,
        reason: record.decision.reason,
        mode: decision.mode,
        canceled,
      },
      'Fragment emitted',
    );

    return { status: 'emitted', fragmentId: fragment.id, record, report, escalation: escalationSummary };
  }

  /**
   * Process a batch on the local pool. Never throws for per-fragment
   * conditions; every fragment yields exactly one outcome.
   */
  async processBatch(fragments: readonly Fragment[], options: ProcessOptions = {}): Promise<BatchResult> {
    const summary = new RunSummaryCollector({ runId: this.provenance.runId });
    const concurrency = resolveConcurrency(this.config.local.concurrency);

    this.log.info({ fragments: fragments.length, concurrency, runId: this.provenance.runId }, 'Batch started');

    const results = await runPool(
      fragments,
      (fragment) => this.processFragment(fragment, options),
      {
        concurrency,
        signal: options.signal,
        onSkipped: (fragment): FragmentOutcome => ({ status: 'canceled', fragmentId: fragment.id }),
      },
    );

    const outcomes = results.filter(isPresent);
    summary.recordAll(outcomes);
    summary.setBudget(this.budget ? this.budget.snapshot() : null);
    const runSummary = summary.toJSON();

    this.log.info(
      {
        runId: runSummary.runId,
        emitted: runSummary.emitted,
        quarantined: runSummary.quarantined,
        quarantineEntries: runSummary.quarantineEntries,
        hardfails: runSummary.hardfails,
        canceled: runSummary.canceled,
      },
      'Batch finished',
    );

    return { outcomes, summary: runSummary };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async timedLocal(fragment: RedactedFragment, report: RedactionReport): Promise<LocalRun> {
    const start = performance.now();
    const analysis = await this.localAnalyzer.analyze(fragment, report);
    const latencyMs = Math.round(performance.now() - start);
    return {
      latencyMs,
      record: {
        fragmentId: fragment.fragmentId,
        conversationId: fragment.conversationId,
        sessionId: fragment.sessionId,
        speechAct: analysis.speechAct,
        emotionPrimary: analysis.emotionPrimary,
        stance: analysis.stance,
        intent: analysis.intent,
        coarseLabels: this.labels.coarseOnly(analysis.coarseLabels),
        confidenceLlm: analysis.confidenceLlm,
        fineLabelsLocal: [...analysis.fineLabelsLocal],
        source: 'local',
      },
    };
  }

  private async callRemote(
    remote: RemoteAnalyzer,
    payload: RemotePayload,
    prompt: string,
    local: EnrichmentRecord,
    successReason: MergeReason,
    signal: AbortSignal | undefined,
  ): Promise<EscalationOutcome> {
    // A cancel that landed while waiting for a slot issues no call
    if (signal?.aborted) return { record: null, reason: 'canceled', attempts: 0 };

    const start = performance.now();
    let response: RemoteResponse;
    let attempts: number;
    try {
      const result = await this.caller.call('remote-analyze', (s) => remote.analyze(payload, s), { signal });
      response = result.result;
      attempts = result.attempts.length;
    } catch (err) {
      if (err instanceof RemoteCallError) {
        const reason: MergeReason =
          err.code === 'remote_timeout' || err.code === 'canceled' || err.code === 'validation_failed'
            ? err.code
            : 'transport_error';
        this.log.warn({ fragmentId: local.fragmentId, reason, attempts: err.attempts.length }, 'Remote escalation failed');
        return { record: null, reason, attempts: err.attempts.length };
      }
      throw err;
    }
    const latencyMs = Math.round(performance.now() - start);

    const analysis = validateAnalysis(response.analysis);
    if (!analysis.valid) {
      await this.validator.quarantineRecord(response.analysis, analysis.error);
      return { record: null, reason: 'validation_failed', attempts, quarantined: true };
    }

    const record: EnrichmentRecord = {
      fragmentId: local.fragmentId,
      conversationId: local.conversationId,
      sessionId: local.sessionId,
      speechAct: analysis.record.speechAct,
      emotionPrimary: analysis.record.emotionPrimary,
      stance: analysis.record.stance,
      intent: analysis.record.intent,
      coarseLabels: this.labels.coarseOnly(analysis.record.coarseLabels),
      confidenceLlm: analysis.record.confidenceLlm,
      fineLabelsLocal: [...local.fineLabelsLocal],
      source: 'remote',
    };

    if (this.remoteCache.size >= REMOTE_CACHE_LIMIT) {
      const oldest = this.remoteCache.keys().next();
      if (!oldest.done) this.remoteCache.delete(oldest.value);
    }
    this.remoteCache.set(prompt, record);

    const tokenUsage = response.tokenUsage ?? usage(estimateTokens(prompt), estimateTokens(JSON.stringify(response.analysis)));
    return {
      record,
      reason: successReason,
      attempts,
      remote: {
        modelId: response.modelId ?? remote.modelId,
        prompt,
        tokenUsage,
        latencyMs,
        cacheHit: response.cacheHit ?? false,
      },
    };
  }

  private provenanceMeta(fragment: RedactedFragment, local: LocalRun, escalation: EscalationOutcome): ProvenanceMeta {
    if (escalation.record && escalation.remote) {
      return { ...escalation.remote, source: fragment.text };
    }
    const completion = canonicalJson({
      speechAct: local.record.speechAct,
      emotionPrimary: local.record.emotionPrimary,
      stance: local.record.stance,
      intent: local.record.intent,
    });
    return {
      modelId: this.localAnalyzer.modelId,
      prompt: fragment.text,
      source: fragment.text,
      tokenUsage: usage(estimateTokens(fragment.text), estimateTokens(completion)),
      latencyMs: local.latencyMs,
      cacheHit: false,
    };
  }
}

function usage(prompt: number, completion: number): TokenUsage {
  return { prompt, completion, total: prompt + completion };
}

/** JSONL sinks under `dir`: records.jsonl and redactions.jsonl. */
export function jsonlSinks(dir: string): { records: JsonlWriter<FinalRecord>; redactions: JsonlWriter<RedactionPair> } {
  return {
    records: new JsonlWriter<FinalRecord>(join(dir, 'records.jsonl')),
    redactions: new JsonlWriter<RedactionPair>(join(dir, 'redactions.jsonl')),
  };
}
