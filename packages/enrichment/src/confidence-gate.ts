/**
 * @veil/enrichment - Confidence gate and routing sessions
 *
 * Hysteresis routing per session. The first decision compares against
 * tau; after that a REMOTE session stays remote until confidence reaches
 * tauHigh, and a LOCAL session stays local until confidence drops below
 * tauLow. The widened band damps flapping around a single threshold.
 *
 * The mode follows the confidence signal only. Whether an escalation is
 * actually allowed (authorization, coverage) is decided by the caller.
 */

import pino from 'pino';
import {
  ConfigurationError,
  Mutex,
  clampUnit,
  thresholdIssues,
  type GateThresholds,
} from '@veil/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RoutingMode = 'LOCAL' | 'REMOTE';

export interface RoutingState {
  mode: RoutingMode;
  /** Decisions taken so far in this session. */
  decisions: number;
  /** Mode changes so far in this session. */
  transitions: number;
}

export interface GateDecision {
  /** Mode after this decision. */
  mode: RoutingMode;
  /** Whether the confidence signal asks for remote analysis. */
  wantsRemote: boolean;
  /** Threshold the confidence was compared against. */
  threshold: number;
  /** Whether this decision changed the mode. */
  transitioned: boolean;
}

// ---------------------------------------------------------------------------
// ConfidenceGate
// ---------------------------------------------------------------------------

export class ConfidenceGate {
  readonly thresholds: Readonly<GateThresholds>;

  constructor(thresholds: GateThresholds) {
    const issues = thresholdIssues('/gate', thresholds);
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid confidence thresholds', issues);
    }
    this.thresholds = Object.freeze({ ...thresholds });
  }

  initialState(): RoutingState {
    return { mode: 'LOCAL', decisions: 0, transitions: 0 };
  }

  /**
   * Pure decision function: the next mode for `state` given `confidence`.
   */
  decide(state: RoutingState, confidence: number): GateDecision {
    const c = clampUnit(confidence);
    const { tau, tauLow, tauHigh } = this.thresholds;

    let threshold: number;
    if (state.decisions === 0 && state.mode === 'LOCAL') {
      threshold = tau;
    } else if (state.mode === 'REMOTE') {
      threshold = tauHigh;
    } else {
      threshold = tauLow;
    }

    const wantsRemote = c < threshold;
    const mode: RoutingMode = wantsRemote ? 'REMOTE' : 'LOCAL';
    return { mode, wantsRemote, threshold, transitioned: mode !== state.mode };
  }
}

// ---------------------------------------------------------------------------
// RoutingSession
// ---------------------------------------------------------------------------

/**
 * One session's routing state. All reads and writes go through a mutex,
 * so concurrent fragments of the same session see a consistent sequence
 * of decisions.
 */
export class RoutingSession {
  private state: RoutingState;
  private readonly mutex = new Mutex();

  constructor(
    readonly sessionId: string,
    private readonly gate: ConfidenceGate,
    private readonly log?: pino.Logger,
  ) {
    this.state = gate.initialState();
  }

  decide(confidence: number): Promise<GateDecision> {
    return this.mutex.runExclusive(() => {
      const decision = this.gate.decide(this.state, confidence);
      this.state = {
        mode: decision.mode,
        decisions: this.state.decisions + 1,
        transitions: this.state.transitions + (decision.transitioned ? 1 : 0),
      };
      if (decision.transitioned) {
        this.log?.info(
          { sessionId: this.sessionId, mode: decision.mode, threshold: decision.threshold },
          'Routing mode changed',
        );
      }
      return decision;
    });
  }

  snapshot(): Readonly<RoutingState> {
    return { ...this.state };
  }
}

// ---------------------------------------------------------------------------
// SessionRegistry
// ---------------------------------------------------------------------------

/** Hands out one RoutingSession per session id. */
export class SessionRegistry {
  private readonly sessions = new Map<string, RoutingSession>();
  private readonly log: pino.Logger;

  constructor(
    readonly gate: ConfidenceGate,
    logger?: pino.Logger,
  ) {
    this.log = logger ?? pino({ name: '@veil/enrichment-routing' });
  }

  get(sessionId: string): RoutingSession {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new RoutingSession(sessionId, this.gate, this.log);
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
