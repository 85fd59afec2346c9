/**
 * @veil/enrichment - Provenance recorder
 *
 * Stamps every emitted record with immutable audit metadata. All fields
 * are required; a record that cannot be fully stamped is a schema
 * violation, not a partially stamped record.
 */

import { Value } from '@sinclair/typebox/value';
import {
  ProvenanceSchema,
  SchemaValidationError,
  createRunId,
  deepFreeze,
  hash,
  type FinalRecord,
  type Issue,
  type MergedRecord,
  type Provenance,
  type TokenUsage,
} from '@veil/core';

export interface ProvenanceMeta {
  modelId: string;
  /** Text sent to the model; only its fingerprint is kept. */
  prompt: string;
  /** Redacted source text; only its fingerprint is kept. */
  source: string;
  tokenUsage: TokenUsage;
  latencyMs: number;
  cacheHit: boolean;
}

export interface ProvenanceRecorderOptions {
  /** Defaults to a fresh run id. */
  runId?: string;
  schemaVersion: string;
  /** Injectable clock for deterministic timestamps. */
  clock?: () => Date;
}

export class ProvenanceRecorder {
  readonly runId: string;
  readonly schemaVersion: string;
  private readonly clock: () => Date;

  constructor(options: ProvenanceRecorderOptions) {
    this.runId = options.runId ?? createRunId();
    this.schemaVersion = options.schemaVersion;
    this.clock = options.clock ?? (() => new Date());
  }

  /** SHA-256 hex of `text`. */
  static fingerprint(text: string): string {
    return hash(text);
  }

  /**
   * Return a frozen copy of `record` carrying provenance.
   *
   * @throws SchemaValidationError when any provenance field is missing or invalid
   */
  attach(record: MergedRecord, meta: ProvenanceMeta): Readonly<FinalRecord> {
    const provenance = this.build(meta);
    return deepFreeze({ ...record, provenance });
  }

  build(meta: ProvenanceMeta): Provenance {
    const candidate = {
      schemaVersion: this.schemaVersion,
      runId: this.runId,
      timestamp: this.clock().toISOString(),
      modelId: meta.modelId,
      promptHash: typeof meta.prompt === 'string' ? ProvenanceRecorder.fingerprint(meta.prompt) : undefined,
      sourceHash: typeof meta.source === 'string' ? ProvenanceRecorder.fingerprint(meta.source) : undefined,
      tokenUsage: meta.tokenUsage,
      latencyMs: meta.latencyMs,
      cacheHit: meta.cacheHit,
    };

    const issues: Issue[] = [...Value.Errors(ProvenanceSchema, candidate)].map((e) => ({
      path: `/provenance${e.path}`,
      message: e.message,
    }));
    if (
      issues.length === 0 &&
      candidate.tokenUsage.total !== candidate.tokenUsage.prompt + candidate.tokenUsage.completion
    ) {
      issues.push({ path: '/provenance/tokenUsage/total', message: 'total must equal prompt + completion' });
    }

    if (issues.length > 0 || !Value.Check(ProvenanceSchema, candidate)) {
      throw new SchemaValidationError('Provenance is incomplete', issues);
    }
    return candidate;
  }
}
