/**
 * @veil/enrichment - HTTP remote analyzer
 *
 * POSTs a RemotePayload as JSON to the configured endpoint. Transport
 * failures surface as RemoteTransportError / HttpError so the retry
 * policy can classify them; the body is returned unvalidated.
 */

import { Value } from '@sinclair/typebox/value';
import {
  RemoteTransportError,
  SchemaValidationError,
  TokenUsageSchema,
  errorMessage,
  isPlainObject,
} from '@veil/core';
import { HttpError } from '@veil/fallback';
import type { RemotePayload } from '../labels.js';
import type { RemoteAnalyzer, RemoteResponse } from './types.js';

export interface HttpRemoteAnalyzerOptions {
  endpoint: string;
  modelId?: string;
  /** Sent as a Bearer token when set. */
  apiKey?: string;
  headers?: Record<string, string>;
  /** Defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

/**
 * Accept either `{ analysis, modelId?, tokenUsage?, cacheHit? }` or a bare
 * analysis object. Unrecognised metadata is dropped, never trusted.
 */
export function parseRemoteResponse(body: unknown): RemoteResponse {
  if (!isPlainObject(body) || !('analysis' in body)) {
    return { analysis: body };
  }
  const response: RemoteResponse = { analysis: body.analysis };
  if (typeof body.modelId === 'string' && body.modelId.length > 0) response.modelId = body.modelId;
  if (Value.Check(TokenUsageSchema, body.tokenUsage)) response.tokenUsage = body.tokenUsage;
  if (typeof body.cacheHit === 'boolean') response.cacheHit = body.cacheHit;
  return response;
}

export class HttpRemoteAnalyzer implements RemoteAnalyzer {
  readonly modelId: string;
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRemoteAnalyzerOptions) {
    this.endpoint = options.endpoint;
    this.modelId = options.modelId ?? 'remote/default';
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.headers = {
      'Content-Type': 'application/json',
      ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      ...options.headers,
    };
  }

  async analyze(payload: RemotePayload, signal: AbortSignal): Promise<RemoteResponse> {
    let resp: Response;
    try {
      resp = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({ model: this.modelId, input: payload }),
        signal,
      });
    } catch (err: unknown) {
      throw new RemoteTransportError(`Remote analyzer request failed: ${errorMessage(err)}`, 0, { cause: err });
    }

    if (!resp.ok) {
      throw new HttpError(`Remote analyzer returned HTTP ${resp.status}`, resp.status);
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch {
      throw new SchemaValidationError('Remote analyzer returned a non-JSON body', [
        { path: '/', message: 'expected a JSON document' },
      ]);
    }

    return parseRemoteResponse(body);
  }
}
