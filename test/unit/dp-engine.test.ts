/**
 * Unit Tests for the DifferentialPrivacyEngine and PrivacyBudget
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BudgetExceeded, ConfigurationError } from '@veil/core';
import {
  DifferentialPrivacyEngine,
  PrivacyBudget,
  SaltStore,
  SeededRandom,
  histogramCounts,
  queryFingerprint,
  type DataRecord,
  type DPQuery,
} from '@veil/privacy';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const records: DataRecord[] = [
  { session: 'a', minutes: 5, mood: 'calm' },
  { session: 'a', minutes: 12, mood: 'tense' },
  { session: 'b', minutes: 20, mood: 'calm' },
  { session: 'b', minutes: 25, mood: 'calm' },
  { session: 'c', minutes: 0, mood: 'excited' },
];

describe('SeededRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = new SeededRandom('seed-1');
    const b = new SeededRandom('seed-1');
    const drawsA = Array.from({ length: 10 }, () => a.next());
    const drawsB = Array.from({ length: 10 }, () => b.next());
    expect(drawsA).toEqual(drawsB);
    expect(drawsA.every((u) => u > 0 && u < 1)).toBe(true);
  });

  it('differs between seeds', () => {
    expect(new SeededRandom('seed-1').next()).not.toBe(new SeededRandom('seed-2').next());
  });

  it('draws Laplace noise with mean 0 and variance 2b²', () => {
    const rng = new SeededRandom('laplace-check');
    const draws = Array.from({ length: 20_000 }, () => rng.laplace(1));
    const mean = draws.reduce((a, v) => a + v, 0) / draws.length;
    const variance = draws.reduce((a, v) => a + (v - mean) ** 2, 0) / draws.length;
    expect(Math.abs(mean)).toBeLessThan(0.05);
    expect(variance).toBeGreaterThan(1.8);
    expect(variance).toBeLessThan(2.2);
  });
});

describe('DifferentialPrivacyEngine', () => {
  let engine: DifferentialPrivacyEngine;
  let budget: PrivacyBudget;

  beforeEach(() => {
    engine = new DifferentialPrivacyEngine({ epsilon: 0.5, delta: 1e-6 });
    budget = new PrivacyBudget({ maxEpsilon: 3, maxDelta: 1e-5 });
  });

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------
  describe('construction', () => {
    it('rejects epsilon outside (0, 10]', () => {
      expect(() => new DifferentialPrivacyEngine({ epsilon: 0, delta: 1e-6 })).toThrow(ConfigurationError);
      expect(() => new DifferentialPrivacyEngine({ epsilon: 12, delta: 1e-6 })).toThrow(ConfigurationError);
    });

    it('rejects delta outside (0, 0.01]', () => {
      expect(() => new DifferentialPrivacyEngine({ epsilon: 1, delta: 0.5 })).toThrow(ConfigurationError);
    });

    it('rejects reproducible mode without a salt', () => {
      expect(() => new DifferentialPrivacyEngine({ epsilon: 1, delta: 1e-6, reproducible: true })).toThrow(
        /reproducible mode requires a salt/,
      );
    });

    it('rejects a non-positive sum bound', () => {
      expect(() => new DifferentialPrivacyEngine({ epsilon: 1, delta: 1e-6, sumBound: 0 })).toThrow(
        ConfigurationError,
      );
    });

    it('rejects an invalid budget', () => {
      expect(() => new PrivacyBudget({ maxEpsilon: -1, maxDelta: 1e-5 })).toThrow(ConfigurationError);
    });
  });

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------
  describe('queries', () => {
    it('count uses sensitivity 1 and Laplace scale 1/ε', async () => {
      const result = await engine.executeQuery(records, { type: 'count' }, budget);
      expect(result.queryType).toBe('count');
      expect(result.trueValue).toBe(5);
      expect(result.sensitivity).toBe(1);
      expect(result.noiseScale).toBe(2);
      expect(result.mechanism).toBe('laplace');
      expect(result.epsilonSpent).toBe(0.5);
      expect(result.deltaSpent).toBe(0);
      expect(result.budgetRemaining).toBe(2.5);
      expect(result.deterministicSeedUsed).toBe(false);
      expect(result.noisyValue).toBeGreaterThanOrEqual(0);
    });

    it('count applies the filter', async () => {
      const result = await engine.executeQuery(records, { type: 'count', filter: { mood: 'calm' } }, budget);
      expect(result.trueValue).toBe(3);
    });

    it('count never reports a negative value', async () => {
      const empty = new PrivacyBudget({ maxEpsilon: 10, maxDelta: 1e-5 });
      for (let i = 0; i < 20; i++) {
        const result = await engine.executeQuery([], { type: 'count', epsilon: 0.1 }, empty, { seed: `s${i}` });
        expect(result.noisyValue).toBeGreaterThanOrEqual(0);
      }
    });

    it('sum clamps each value to the bound', async () => {
      const data: DataRecord[] = [{ v: 5 }, { v: -3 }, { v: 0.5 }, { v: 'x' }];
      const result = await engine.executeQuery(data, { type: 'sum', field: 'v', bound: 1 }, budget);
      expect(result.trueValue).toBe(0.5);
      expect(result.sensitivity).toBe(1);
    });

    it('sum falls back to the engine bound', async () => {
      const bounded = new DifferentialPrivacyEngine({ epsilon: 1, delta: 1e-6, sumBound: 10 });
      const result = await bounded.executeQuery(records, { type: 'sum', field: 'minutes' }, budget);
      expect(result.trueValue).toBe(35);
      expect(result.sensitivity).toBe(10);
      expect(result.noiseScale).toBe(10);
    });

    it('mean clamps values and the noisy answer to the bounds', async () => {
      const result = await engine.executeQuery(
        records,
        { type: 'mean', field: 'minutes', bounds: [0, 20] },
        budget,
      );
      expect(result.trueValue).toBe(11.4);
      expect(result.sensitivity).toBe(4);
      expect(result.noisyValue).toBeGreaterThanOrEqual(0);
      expect(result.noisyValue).toBeLessThanOrEqual(20);
    });

    it('mean over no data reports the midpoint', async () => {
      const result = await engine.executeQuery([], { type: 'mean', field: 'minutes', bounds: [10, 30] }, budget);
      expect(result.trueValue).toBe(20);
      expect(result.sensitivity).toBe(20);
    });

    it('histogram over numeric edges', async () => {
      const result = await engine.executeQuery(
        records,
        { type: 'histogram', field: 'minutes', bins: { edges: [0, 10, 20] } },
        budget,
      );
      expect(result.bins?.map((b) => [b.label, b.trueCount])).toEqual([
        ['[0, 10)', 2],
        ['[10, 20]', 2],
      ]);
      expect(result.trueValue).toBe(4);
      expect(result.bins?.every((b) => b.noisyCount >= 0)).toBe(true);
      const binTotal = (result.bins ?? []).reduce((acc, b) => acc + b.noisyCount, 0);
      expect(result.noisyValue).toBeCloseTo(binTotal, 10);
    });

    it('histogramCounts over categories ignores unknown values', () => {
      expect(histogramCounts(records, 'mood', { categories: ['calm', 'tense'] })).toEqual([
        { label: 'calm', count: 3 },
        { label: 'tense', count: 1 },
      ]);
    });

    it('histogramCounts keeps one bin per category', () => {
      expect(histogramCounts(records, 'mood', { categories: ['calm', 'calm', 'tense'] })).toEqual([
        { label: 'calm', count: 3 },
        { label: 'tense', count: 1 },
      ]);
    });

    it('gaussian sigma is Δ·sqrt(2 ln(1.25/δ))/ε and accounts delta', async () => {
      const result = await engine.executeQuery(records, { type: 'count', mechanism: 'gaussian' }, budget);
      expect(result.mechanism).toBe('gaussian');
      expect(result.deltaSpent).toBe(1e-6);
      expect(result.noiseScale).toBeCloseTo(Math.sqrt(2 * Math.log(1.25 / 1e-6)) / 0.5, 12);
      expect(budget.accountedDelta).toBe(1e-6);
    });
  });

  // ---------------------------------------------------------------------------
  // Invalid queries
  // ---------------------------------------------------------------------------
  describe('invalid queries', () => {
    const invalid: Array<[string, DPQuery]> = [
      ['mean with inverted bounds', { type: 'mean', field: 'minutes', bounds: [5, 1] }],
      ['histogram with one edge', { type: 'histogram', field: 'minutes', bins: { edges: [0] } }],
      ['histogram without categories', { type: 'histogram', field: 'mood', bins: { categories: [] } }],
      ['histogram with repeated categories', { type: 'histogram', field: 'mood', bins: { categories: ['calm', 'calm'] } }],
      ['sum with a zero bound', { type: 'sum', field: 'minutes', bound: 0 }],
      ['epsilon above 10', { type: 'count', epsilon: 11 }],
      ['gaussian with delta above 0.01', { type: 'count', mechanism: 'gaussian', delta: 0.5 }],
    ];

    it.each(invalid)('rejects %s without charging the budget', async (_name, query) => {
      await expect(engine.executeQuery(records, query, budget)).rejects.toThrow(ConfigurationError);
      expect(budget.spentEpsilon).toBe(0);
      expect(budget.queries).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Seeds
  // ---------------------------------------------------------------------------
  describe('seeds', () => {
    it('an explicit seed reproduces the noisy answer', async () => {
      const a = await engine.executeQuery(records, { type: 'count' }, budget, { seed: 'fixed-seed' });
      const b = await engine.executeQuery(records, { type: 'count' }, budget, { seed: 'fixed-seed' });
      expect(a.noisyValue).toBe(b.noisyValue);
      expect(a.deterministicSeedUsed).toBe(true);
      expect(a.seed).toBe('fixed-seed');
    });

    it('reproducible mode derives the seed from salt and query', async () => {
      const salt = SaltStore.fromSecret('test-secret-salt');
      const reproducible = new DifferentialPrivacyEngine({ epsilon: 0.5, delta: 1e-6, reproducible: true, salt });
      const query: DPQuery = { type: 'count', filter: { session: 'a' } };

      const a = await reproducible.executeQuery(records, query, budget);
      const b = await reproducible.executeQuery(records, { filter: { session: 'a' }, type: 'count' }, budget);

      expect(a.seed).toBe(salt.keyedHash('dp', queryFingerprint(query)));
      expect(a.deterministicSeedUsed).toBe(true);
      expect(b.noisyValue).toBe(a.noisyValue);
    });

    it('non-reproducible runs draw fresh seeds', async () => {
      const a = await engine.executeQuery(records, { type: 'count' }, budget);
      const b = await engine.executeQuery(records, { type: 'count' }, budget);
      expect(a.seed).toMatch(/^[a-f0-9]{64}$/);
      expect(a.seed).not.toBe(b.seed);
    });
  });

  // ---------------------------------------------------------------------------
  // Publishing
  // ---------------------------------------------------------------------------
  describe('publishable', () => {
    it('strips the true value, the seed and true bin counts', async () => {
      const result = await engine.executeQuery(
        records,
        { type: 'histogram', field: 'mood', bins: { categories: ['calm'] } },
        budget,
      );
      const published = engine.publishable(result);

      expect(Object.keys(published).sort()).toEqual([
        'bins',
        'budgetRemaining',
        'deltaSpent',
        'deterministicSeedUsed',
        'epsilonSpent',
        'mechanism',
        'noiseScale',
        'noisyValue',
        'queryType',
        'sensitivity',
      ]);
      expect(published.bins).toEqual([{ label: 'calm', noisyCount: result.bins?.[0]?.noisyCount }]);
    });
  });
});

describe('PrivacyBudget', () => {
  it('snapshot reflects spending and reset clears it', async () => {
    const budget = new PrivacyBudget({ maxEpsilon: 1, maxDelta: 1e-5 });
    await budget.exclusive((ledger) => ledger.charge(0.25, 0));
    expect(budget.snapshot()).toEqual({
      maxEpsilon: 1,
      maxDelta: 1e-5,
      spentEpsilon: 0.25,
      accountedDelta: 0,
      queries: 1,
    });

    await budget.reset();
    expect(budget.spentEpsilon).toBe(0);
    expect(budget.queries).toBe(0);
  });

  it('rejects a first delta above maxDelta', async () => {
    const budget = new PrivacyBudget({ maxEpsilon: 1, maxDelta: 1e-5 });
    await expect(budget.exclusive((ledger) => ledger.charge(0.1, 1e-4))).rejects.toThrow(BudgetExceeded);
    expect(budget.accountedDelta).toBe(0);
    expect(budget.spentEpsilon).toBe(0);
  });

  it('accounts one delta per session', async () => {
    const budget = new PrivacyBudget({ maxEpsilon: 1, maxDelta: 1e-5 });
    await budget.exclusive((ledger) => ledger.charge(0.1, 1e-6));
    await budget.exclusive((ledger) => ledger.charge(0.1, 1e-7));
    await expect(budget.exclusive((ledger) => ledger.charge(0.1, 5e-6))).rejects.toThrow(BudgetExceeded);

    expect(budget.accountedDelta).toBe(1e-6);
    expect(budget.queries).toBe(2);
  });

  it('spends exactly up to the cap without float drift', async () => {
    const budget = new PrivacyBudget({ maxEpsilon: 0.3, maxDelta: 1e-5 });
    await budget.exclusive((ledger) => ledger.charge(0.1, 0));
    await budget.exclusive((ledger) => ledger.charge(0.2, 0));

    expect(budget.spentEpsilon).toBe(0.3);
    expect(budget.remainingEpsilon).toBe(0);
    expect(budget.queries).toBe(2);
    await expect(budget.exclusive((ledger) => ledger.charge(0.01, 0))).rejects.toThrow(BudgetExceeded);
    expect(budget.spentEpsilon).toBe(0.3);
  });

  it('the ledger is unusable after its section ends', async () => {
    const budget = new PrivacyBudget({ maxEpsilon: 1, maxDelta: 1e-5 });
    const leaked = await budget.exclusive((ledger) => ledger);
    expect(() => leaked.charge(0.1, 0)).toThrow('Budget ledger used outside its exclusive section');
    expect(budget.spentEpsilon).toBe(0);
  });
});
