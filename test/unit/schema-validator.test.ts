/**
 * Unit Tests for the SchemaValidator and quarantine sinks
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SchemaValidationError, type FinalRecord } from '@veil/core';
import {
  JsonlQuarantine,
  MemoryQuarantine,
  RECORD_SCHEMAS,
  SchemaValidator,
  validateAnalysis,
} from '@veil/enrichment';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const validRecord = (): FinalRecord => ({
  fragmentId: 'f1',
  conversationId: 'c1',
  sessionId: 's1',
  speechAct: 'ask',
  emotionPrimary: 'neutral',
  stance: 'neutral',
  intent: 'ask about planning',
  coarseLabels: ['planning'],
  confidenceLlm: 0.64,
  fineLabelsLocal: [],
  source: 'local',
  confidenceLocal: 0.64,
  decision: { sourceLastEnrichment: 'local', reason: 'none' },
  canceled: false,
  provenance: {
    schemaVersion: '1.0.0',
    runId: 'run_test',
    timestamp: '2024-05-01T12:00:00.000Z',
    modelId: 'local/heuristic-1',
    promptHash: 'a'.repeat(64),
    sourceHash: 'b'.repeat(64),
    tokenUsage: { prompt: 6, completion: 18, total: 24 },
    latencyMs: 1,
    cacheHit: false,
  },
});

describe('SchemaValidator', () => {
  let quarantine: MemoryQuarantine;
  let validator: SchemaValidator;

  beforeEach(() => {
    quarantine = new MemoryQuarantine();
    validator = new SchemaValidator({ quarantine });
  });

  it('lists the supported schema versions', () => {
    expect(validator.supportedVersions).toEqual(['1.0.0']);
    expect(Object.isFrozen(RECORD_SCHEMAS)).toBe(true);
  });

  it('accepts a complete record', () => {
    const record = validRecord();
    expect(validator.validate(record, '1.0.0')).toEqual({ valid: true, record });
  });

  it('rejects an unknown schema version', () => {
    const outcome = validator.validate(validRecord(), '9.9.9');
    expect(outcome.valid).toBe(false);
    if (!outcome.valid) {
      expect(outcome.error.message).toBe('Unknown schema version "9.9.9"');
      expect(outcome.error.issues).toEqual([{ path: '/provenance/schemaVersion', message: 'supported: 1.0.0' }]);
    }
  });

  it('reports the path of every issue', () => {
    const record = { ...validRecord(), speechAct: 'shout', confidenceLocal: 1.5 };
    const outcome = validator.validate(record, '1.0.0');
    expect(outcome.valid).toBe(false);
    if (!outcome.valid) {
      expect(outcome.error).toBeInstanceOf(SchemaValidationError);
      expect(outcome.error.code).toBe('validation_failed');
      const paths = outcome.error.issues.map((i) => i.path);
      expect(paths).toContain('/speechAct');
      expect(paths).toContain('/confidenceLocal');
    }
  });

  it('rejects a record without provenance', () => {
    const { provenance: _provenance, ...bare } = validRecord();
    const outcome = validator.validate(bare, '1.0.0');
    expect(outcome.valid).toBe(false);
    if (!outcome.valid) expect(outcome.error.issues.map((i) => i.path)).toContain('/provenance');
  });

  it('quarantines invalid records and lets valid ones through', async () => {
    const bad = { ...validRecord(), stance: 'hostile' };
    const result = await validator.validateBatch([validRecord(), bad, validRecord()], '1.0.0');

    expect(result.valid).toHaveLength(2);
    expect(result.invalid).toHaveLength(1);
    expect(result.invalid[0].originalRecord).toEqual(bad);
    expect(result.invalid[0].errorDetail.code).toBe('validation_failed');
    expect(quarantine.count).toBe(1);
    expect(validator.quarantinedCount).toBe(1);
  });

  it('quarantines on validateOrQuarantine failure only', async () => {
    await validator.validateOrQuarantine(validRecord(), '1.0.0');
    expect(quarantine.count).toBe(0);

    await validator.validateOrQuarantine({ fragmentId: 'f2' }, '1.0.0');
    expect(quarantine.count).toBe(1);
    expect(quarantine.entries[0].originalRecord).toEqual({ fragmentId: 'f2' });
  });
});

describe('validateAnalysis', () => {
  it('accepts a well-formed remote analysis', () => {
    const analysis = {
      speechAct: 'propose',
      emotionPrimary: 'joy',
      stance: 'supportive',
      intent: 'propose dinner',
      coarseLabels: ['social'],
      confidenceLlm: 0.91,
    };
    expect(validateAnalysis(analysis).valid).toBe(true);
  });

  it('rejects an intent longer than 200 characters', () => {
    const outcome = validateAnalysis({
      speechAct: 'inform',
      emotionPrimary: 'neutral',
      stance: 'neutral',
      intent: 'x'.repeat(201),
      coarseLabels: [],
      confidenceLlm: 0.5,
    });
    expect(outcome.valid).toBe(false);
    if (!outcome.valid) expect(outcome.error.issues.map((i) => i.path)).toEqual(['/intent']);
  });

  it('rejects non-objects', () => {
    expect(validateAnalysis('fine').valid).toBe(false);
    expect(validateAnalysis(null).valid).toBe(false);
  });
});

describe('JsonlQuarantine', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'veil-quarantine-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one entry per line', async () => {
    const path = join(dir, 'nested', 'quarantine.jsonl');
    const sink = new JsonlQuarantine(path);
    const validator = new SchemaValidator({ quarantine: sink });

    await validator.quarantineRecord({ id: 1 }, new SchemaValidationError('bad', [{ path: '/id', message: 'nope' }]));
    await validator.quarantineRecord({ id: 2 }, new SchemaValidationError('worse'));

    expect(sink.count).toBe(2);
    const lines = (await readFile(path, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);

    const entries = await sink.readAll();
    expect(entries[0]).toMatchObject({
      originalRecord: { id: 1 },
      errorDetail: { code: 'validation_failed', message: 'bad', issues: [{ path: '/id', message: 'nope' }] },
    });
    expect(entries[1]).toMatchObject({ originalRecord: { id: 2 }, errorDetail: { message: 'worse', issues: [] } });
  });
});
