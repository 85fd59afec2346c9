/**
 * @veil/enrichment - Analyzer contracts
 *
 * The local analyzer runs on-device over redacted text and may produce
 * fine (local-only) labels. The remote analyzer only ever receives a
 * RemotePayload and its response is untrusted until validated.
 */

import type { Analysis, RedactedFragment, RedactionReport, TokenUsage } from '@veil/core';
import type { RemotePayload } from '../labels.js';

export interface LocalAnalysis extends Analysis {
  fineLabelsLocal: string[];
}

export interface LocalAnalyzer {
  readonly modelId: string;
  analyze(fragment: RedactedFragment, report: RedactionReport): Promise<LocalAnalysis>;
}

export interface RemoteResponse {
  /** Unvalidated analysis body. */
  analysis: unknown;
  modelId?: string;
  tokenUsage?: TokenUsage;
  cacheHit?: boolean;
}

export interface RemoteAnalyzer {
  readonly modelId: string;
  analyze(payload: RemotePayload, signal: AbortSignal): Promise<RemoteResponse>;
}

/**
 * Estimate token count using the ~4 chars per token heuristic.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
