/**
 * Unit Tests for @veil/core primitives
 *
 * Canonical JSON, hashing, freezing, run ids, the semaphore/mutex pair,
 * the worker pool and the JSONL writer.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createHmac } from 'node:crypto';
import {
  canonicalJson,
  hash,
  hmac,
  deepFreeze,
  clampUnit,
  createRunId,
  sleep,
  Semaphore,
  Mutex,
  runPool,
  resolveConcurrency,
  JsonlWriter,
  errorCodeOf,
  RemoteTimeoutError,
} from '@veil/core';

describe('utilities', () => {
  it('canonicalJson sorts keys recursively and drops undefined', () => {
    expect(canonicalJson({ b: 1, a: { d: [1, { z: 0, y: undefined }], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[1,{"z":0}]},"b":1}',
    );
  });

  it('canonicalJson is insensitive to key order', () => {
    expect(canonicalJson({ x: 1, y: 2 })).toBe(canonicalJson({ y: 2, x: 1 }));
  });

  it('hash is SHA-256 hex', () => {
    expect(hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('hmac matches node:crypto', () => {
    const expected = createHmac('sha256', 'test-secret').update('payload').digest('hex');
    expect(hmac('test-secret', 'payload')).toBe(expected);
  });

  it('deepFreeze freezes nested values', () => {
    const value = deepFreeze({ outer: { inner: [1, 2] } });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.outer)).toBe(true);
    expect(Object.isFrozen(value.outer.inner)).toBe(true);
  });

  it('clampUnit clamps and maps NaN to 0', () => {
    expect(clampUnit(1.4)).toBe(1);
    expect(clampUnit(-0.2)).toBe(0);
    expect(clampUnit(Number.NaN)).toBe(0);
    expect(clampUnit(0.42)).toBe(0.42);
  });

  it('createRunId has the run_ prefix and 16 lowercase alphanumerics', () => {
    expect(createRunId()).toMatch(/^run_[0-9a-z]{16}$/);
    expect(createRunId()).not.toBe(createRunId());
  });

  it('sleep resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('errorCodeOf maps unknown errors to transport_error', () => {
    expect(errorCodeOf(new Error('boom'))).toBe('transport_error');
    expect(errorCodeOf(new RemoteTimeoutError(10, 'x'))).toBe('remote_timeout');
  });
});

describe('Semaphore', () => {
  it('rejects non-positive permits', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('never runs more than `permits` tasks at once', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(5);
          active--;
        }),
      ),
    );

    expect(peak).toBe(2);
    expect(semaphore.free).toBe(2);
    expect(semaphore.pending).toBe(0);
  });

  it('releases the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(() => Promise.reject(new Error('fail')))).rejects.toThrow('fail');
    expect(semaphore.free).toBe(1);
  });
});

describe('Mutex', () => {
  it('serializes read-modify-write sequences', async () => {
    const mutex = new Mutex();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        mutex.runExclusive(async () => {
          const read = counter;
          await sleep(1);
          counter = read + 1;
        }),
      ),
    );

    expect(counter).toBe(10);
    expect(mutex.locked).toBe(false);
  });
});

describe('runPool', () => {
  it('returns results in input order', async () => {
    const results = await runPool([30, 10, 20], async (ms, i) => {
      await sleep(ms);
      return i * 10;
    }, { concurrency: 3 });
    expect(results).toEqual([0, 10, 20]);
  });

  it('stops taking items once the signal aborts', async () => {
    const controller = new AbortController();
    const skipped: number[] = [];

    const results = await runPool(
      [0, 1, 2, 3],
      async (item) => {
        if (item === 1) controller.abort();
        return `done-${item}`;
      },
      {
        concurrency: 1,
        signal: controller.signal,
        onSkipped: (item) => {
          skipped.push(item);
          return `skipped-${item}`;
        },
      },
    );

    expect(results).toEqual(['done-0', 'done-1', 'skipped-2', 'skipped-3']);
    expect(skipped).toEqual([2, 3]);
  });

  it('resolveConcurrency treats 0 as one worker per core', () => {
    expect(resolveConcurrency(3)).toBe(3);
    expect(resolveConcurrency(0)).toBeGreaterThanOrEqual(1);
  });
});

describe('JsonlWriter', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'veil-jsonl-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates the parent directory and appends one line per entry', async () => {
    const writer = new JsonlWriter<{ n: number }>(join(tempDir, 'nested', 'out.jsonl'));
    await Promise.all([writer.append({ n: 1 }), writer.appendMany([{ n: 2 }, { n: 3 }])]);

    const entries = await writer.readAll();
    expect(entries).toHaveLength(3);
    expect(entries).toContainEqual({ n: 2 });
  });

  it('reads a missing file as empty', async () => {
    const writer = new JsonlWriter(join(tempDir, 'missing.jsonl'));
    expect(await writer.readAll()).toEqual([]);
  });

  it('reports a malformed line with its number', async () => {
    const path = join(tempDir, 'bad.jsonl');
    await writeFile(path, '{"ok":true}\nnot-json\n', 'utf-8');
    await expect(new JsonlWriter(path).readAll()).rejects.toThrow(`Malformed JSONL at ${path}:2`);
  });
});
