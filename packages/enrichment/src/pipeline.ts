/**
 * @veil/enrichment - Pipeline assembly
 *
 * Builds every component from a validated VeilConfig: salt, redaction
 * engine, analyzers, validator with a JSONL quarantine, provenance,
 * JSONL record sinks and the DP engine with its budget.
 */

import { join } from 'node:path';
import pino from 'pino';
import { buildPaths, ensureDirectories, createRunId, type VeilConfig } from '@veil/core';
import {
  SaltStore,
  RedactionEngine,
  DifferentialPrivacyEngine,
  PrivacyBudget,
  type Detector,
} from '@veil/privacy';
import { HeuristicAnalyzer } from './analyzers/heuristic.js';
import { HttpRemoteAnalyzer } from './analyzers/http-remote.js';
import type { LocalAnalyzer, RemoteAnalyzer } from './analyzers/types.js';
import { LabelPolicy } from './labels.js';
import { JsonlQuarantine } from './quarantine.js';
import { SchemaValidator } from './schema-validator.js';
import { ProvenanceRecorder } from './provenance.js';
import { HybridOrchestrator, jsonlSinks } from './orchestrator.js';

export interface PipelineOptions {
  /** Defaults to VEIL_HOME. */
  home?: string;
  runId?: string;
  detectors?: Detector[];
  localAnalyzer?: LocalAnalyzer;
  /** Defaults to an HTTP analyzer when `remote.endpoint` is set. */
  remoteAnalyzer?: RemoteAnalyzer;
  /** Sent as a Bearer token by the default HTTP analyzer. */
  remoteApiKey?: string;
  logger?: pino.Logger;
}

export interface Pipeline {
  runId: string;
  salt: SaltStore;
  redactor: RedactionEngine;
  orchestrator: HybridOrchestrator;
  dp: DifferentialPrivacyEngine;
  budget: PrivacyBudget;
  quarantine: JsonlQuarantine;
  paths: {
    records: string;
    redactions: string;
    quarantine: string;
    summary: string;
  };
}

export async function createPipeline(config: VeilConfig, options: PipelineOptions = {}): Promise<Pipeline> {
  const log = options.logger ?? pino({ name: '@veil/enrichment' });
  const paths = ensureDirectories(buildPaths(options.home));
  const outputDir = config.output.dir ?? paths.output;
  const runId = options.runId ?? createRunId();

  const salt = await SaltStore.load(config.salt.path ?? paths.salt);
  const redactor = new RedactionEngine(config.privacy, salt, { detectors: options.detectors, logger: log });
  const labels = new LabelPolicy();

  const remoteAnalyzer = options.remoteAnalyzer ?? (config.remote.endpoint
    ? new HttpRemoteAnalyzer({
        endpoint: config.remote.endpoint,
        modelId: config.remote.modelId,
        apiKey: options.remoteApiKey,
      })
    : undefined);

  const quarantine = new JsonlQuarantine(config.output.dir ? join(outputDir, 'quarantine.jsonl') : paths.quarantine);
  const budget = new PrivacyBudget({ maxEpsilon: config.dp.maxEpsilon, maxDelta: config.dp.maxDelta });
  const dp = new DifferentialPrivacyEngine({ ...config.dp, salt, logger: log });
  const sinks = jsonlSinks(outputDir);

  const orchestrator = new HybridOrchestrator({
    config,
    redactor,
    localAnalyzer: options.localAnalyzer ?? new HeuristicAnalyzer({ modelId: config.local.modelId, labels }),
    remoteAnalyzer,
    labels,
    validator: new SchemaValidator({ quarantine, logger: log }),
    provenance: new ProvenanceRecorder({ runId, schemaVersion: config.output.schemaVersion }),
    budget,
    sinks,
    logger: log,
  });

  log.info(
    { runId, saltFingerprint: salt.fingerprint(), detectorVersion: redactor.detectorVersion, remote: remoteAnalyzer !== undefined },
    'Pipeline ready',
  );

  return {
    runId,
    salt,
    redactor,
    orchestrator,
    dp,
    budget,
    quarantine,
    paths: {
      records: sinks.records.path,
      redactions: sinks.redactions.path,
      quarantine: quarantine.path,
      summary: join(outputDir, `summary-${runId}.json`),
    },
  };
}
