/**
 * Unit Tests for the ConfidenceGate and routing sessions
 */
import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, DEFAULT_CONFIG } from '@veil/core';
import { ConfidenceGate, SessionRegistry } from '@veil/enrichment';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('ConfidenceGate', () => {
  const gate = new ConfidenceGate(DEFAULT_CONFIG.gate);

  it('compares the first decision against tau', () => {
    expect(gate.decide(gate.initialState(), 0.65)).toEqual({
      mode: 'REMOTE',
      wantsRemote: true,
      threshold: 0.7,
      transitioned: true,
    });
    expect(gate.decide(gate.initialState(), 0.72)).toEqual({
      mode: 'LOCAL',
      wantsRemote: false,
      threshold: 0.7,
      transitioned: false,
    });
  });

  it('holds REMOTE until confidence reaches tauHigh', () => {
    const remote = { mode: 'REMOTE' as const, decisions: 1, transitions: 1 };
    expect(gate.decide(remote, 0.75).mode).toBe('REMOTE');
    expect(gate.decide(remote, 0.75).threshold).toBe(0.78);
    expect(gate.decide(remote, 0.78).mode).toBe('LOCAL');
  });

  it('holds LOCAL until confidence drops below tauLow', () => {
    const local = { mode: 'LOCAL' as const, decisions: 3, transitions: 0 };
    expect(gate.decide(local, 0.65).mode).toBe('LOCAL');
    expect(gate.decide(local, 0.62).mode).toBe('LOCAL');
    expect(gate.decide(local, 0.61)).toEqual({
      mode: 'REMOTE',
      wantsRemote: true,
      threshold: 0.62,
      transitioned: true,
    });
  });

  it('clamps confidence into [0, 1]', () => {
    expect(gate.decide(gate.initialState(), 1.5).mode).toBe('LOCAL');
    expect(gate.decide(gate.initialState(), Number.NaN).mode).toBe('REMOTE');
  });

  it('rejects thresholds out of order or out of range', () => {
    expect(() => new ConfidenceGate({ tau: 0.7, tauLow: 0.8, tauHigh: 0.9 })).toThrow(ConfigurationError);
    expect(() => new ConfidenceGate({ tau: 1.2, tauLow: 0.6, tauHigh: 0.8 })).toThrow(ConfigurationError);
  });

  it('freezes its thresholds', () => {
    expect(Object.isFrozen(gate.thresholds)).toBe(true);
  });
});

describe('RoutingSession', () => {
  it('tracks mode, decisions and transitions', async () => {
    const registry = new SessionRegistry(new ConfidenceGate(DEFAULT_CONFIG.gate));
    const session = registry.get('s1');

    const modes: string[] = [];
    for (const confidence of [0.65, 0.75, 0.8, 0.65, 0.6]) {
      modes.push((await session.decide(confidence)).mode);
    }

    expect(modes).toEqual(['REMOTE', 'REMOTE', 'LOCAL', 'LOCAL', 'REMOTE']);
    expect(session.snapshot()).toEqual({ mode: 'REMOTE', decisions: 5, transitions: 3 });
  });

  it('serializes concurrent decisions', async () => {
    const session = new SessionRegistry(new ConfidenceGate(DEFAULT_CONFIG.gate)).get('s1');
    await Promise.all(Array.from({ length: 10 }, () => session.decide(0.9)));
    expect(session.snapshot()).toEqual({ mode: 'LOCAL', decisions: 10, transitions: 0 });
  });
});

describe('SessionRegistry', () => {
  it('hands out one session per id', () => {
    const registry = new SessionRegistry(new ConfidenceGate(DEFAULT_CONFIG.gate));
    const a = registry.get('a');

    expect(registry.get('a')).toBe(a);
    expect(registry.get('b')).not.toBe(a);
    expect(registry.has('a')).toBe(true);
    expect(registry.has('c')).toBe(false);
    expect(registry.size).toBe(2);
  });
});
