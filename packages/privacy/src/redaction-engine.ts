/**
 * @veil/privacy - Redaction engine (Policy Shield)
 *
 * Flow: detect -> filter -> hard-fail check -> resolve overlaps ->
 * pseudonymize / tokenize (right to left) -> coverage report.
 *
 * Identity spans become `⟦PSN:<CLASS>:<id8>⟧`, derived from the keyed hash
 * of (class, normalized value), so the same person maps to the same
 * pseudonym across fragments and runs that share a salt. Other sensitive
 * spans become `⟦TKN:<CLASS>:<id8>⟧` from the keyed hash of the matched
 * text. Coverage is the fraction of detected spans (after overlap
 * resolution) that were replaced.
 */

import pino from 'pino';
import {
  ConfigurationError,
  HardFailContentDetected,
  policyIssues,
  clampUnit,
  deepFreeze,
  type Fragment,
  type PrivacyPolicy,
  type RedactedFragment,
  type RedactionReport,
} from '@veil/core';
import type { Detector, DetectedSpan } from './detectors/types.js';
import { IDENTITY_CLASSES } from './detectors/identity.js';
import { defaultDetectors } from './detectors/index.js';
import { markerRanges, excludeRanges, resolveOverlaps } from './spans.js';
import type { SaltStore } from './salt-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RedactionEngineOptions {
  /** Ordered detector chain. Defaults to identity, topic, hard-fail. */
  detectors?: Detector[];
  logger?: pino.Logger;
}

export interface RedactionResult {
  fragment: RedactedFragment;
  report: RedactionReport;
}

export interface RedactManyResult {
  results: RedactionResult[];
  hardfails: HardFailContentDetected[];
}

export interface MappingStats {
  /** Distinct pseudonyms issued, per class. */
  pseudonyms: Record<string, number>;
  saltFingerprint: string;
}

/** Detected salt echoes are always tokenized, regardless of policy flags. */
const SECRET_CLASS = 'secret';

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Canonical form of an identity value, so trivially different spellings
 * of the same identity share a pseudonym.
 */
export function normalizeIdentity(cls: string, value: string): string {
  const trimmed = value.trim();
  switch (cls) {
    case 'phone': {
      const digits = trimmed.replace(/\D/g, '');
      return digits.length === 11 && digits.startsWith('1') ? digits.slice(1) : digits;
    }
    case 'handle':
      return trimmed.replace(/^@/, '').toLowerCase();
    default:
      return trimmed.replace(/\s+/g, ' ').toLowerCase();
  }
}

function markerClass(cls: string): string {
  return cls.toUpperCase().replace(/[^A-Z0-9_]/g, '_');
}

// ---------------------------------------------------------------------------
// RedactionEngine
// ---------------------------------------------------------------------------

export class RedactionEngine {
  readonly detectorVersion: string;
  readonly policy: Readonly<PrivacyPolicy>;

  private readonly salt: SaltStore;
  private readonly detectors: readonly Detector[];
  private readonly hardFailClasses: ReadonlySet<string>;
  private readonly pseudonyms = new Map<string, string>();
  private readonly log: pino.Logger;

  constructor(policy: PrivacyPolicy, salt: SaltStore, options: RedactionEngineOptions = {}) {
    const issues = policyIssues('/privacy', policy);
    const detectors = options.detectors ?? defaultDetectors();

    const seen = new Set<string>();
    for (const detector of detectors) {
      if (seen.has(detector.name)) {
        issues.push({ path: '/detectors', message: `duplicate detector name "${detector.name}"` });
      }
      seen.add(detector.name);
    }
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid redaction policy', issues);
    }

    this.policy = deepFreeze({ ...policy, hardFailClasses: [...policy.hardFailClasses] });
    this.salt = salt;
    this.detectors = Object.freeze([...detectors]);
    this.hardFailClasses = new Set(policy.hardFailClasses);
    this.detectorVersion = detectors.map((d) => `${d.name}@${d.version}`).join('+');
    this.log = options.logger ?? pino({ name: '@veil/privacy' });
  }

  get requiredCoverage(): number {
    return this.policy.strict ? this.policy.strictCoverageThreshold : this.policy.coverageThreshold;
  }

  /**
   * Redact one fragment.
   *
   * @throws HardFailContentDetected when any span belongs to a hard-fail
   *   class. No redacted text is produced in that case.
   */
  redact(fragment: Fragment): RedactionResult {
    const text = fragment.text;
    const spans = this.detect(text);

    const hardfailClasses = [...new Set(spans.filter((s) => this.hardFailClasses.has(s.class)).map((s) => s.class))].sort();
    if (hardfailClasses.length > 0) {
      const report = this.buildReport(fragment.id, {
        coverage: 0,
        hardfailClasses,
        detected: spans,
        redacted: 0,
        notes: ['hardfail'],
      });
      this.log.warn(
        { fragmentId: fragment.id, classes: hardfailClasses },
        'Hard-fail content detected; fragment halted',
      );
      throw new HardFailContentDetected(report);
    }

    const resolved = resolveOverlaps(spans);
    const notes: string[] = [];
    let redactedText = text;
    let redacted = 0;

    // Right to left so earlier offsets stay valid
    for (let i = resolved.length - 1; i >= 0; i--) {
      const span = resolved[i];
      const replacement = this.replacementFor(span);
      if (replacement === null) {
        notes.push(`unredacted:${span.class}`);
        continue;
      }
      redactedText = redactedText.slice(0, span.start) + replacement + redactedText.slice(span.end);
      redacted++;
    }

    const coverage = resolved.length === 0 ? 1 : redacted / resolved.length;
    if (resolved.length === 0) notes.push('no_sensitive_spans');

    const report = this.buildReport(fragment.id, {
      coverage,
      hardfailClasses: [],
      detected: resolved,
      redacted,
      notes: [...new Set(notes)].sort(),
    });

    const redactedFragment: RedactedFragment = deepFreeze({
      fragmentId: fragment.id,
      conversationId: fragment.conversationId,
      sessionId: fragment.sessionId,
      text: redactedText,
      timestamp: fragment.timestamp,
      detectorVersion: this.detectorVersion,
    });

    this.log.debug(
      {
        fragmentId: fragment.id,
        spansDetected: report.spansDetected,
        spansRedacted: report.spansRedacted,
        coverage: report.coverage,
      },
      'Fragment redacted',
    );

    return { fragment: redactedFragment, report };
  }

  /**
   * Redact a batch. Hard-fail fragments are collected rather than thrown
   * so the rest of the batch proceeds.
   */
  redactMany(fragments: readonly Fragment[]): RedactManyResult {
    const results: RedactionResult[] = [];
    const hardfails: HardFailContentDetected[] = [];

    for (const fragment of fragments) {
      try {
        results.push(this.redact(fragment));
      } catch (err) {
        if (err instanceof HardFailContentDetected) {
          hardfails.push(err);
          continue;
        }
        throw err;
      }
    }

    return { results, hardfails };
  }

  /** Whether the report allows the fragment to leave the device. */
  meetsCoverage(report: RedactionReport): boolean {
    return !report.hardfailTriggered && report.coverage >= report.requiredCoverage;
  }

  /** Pseudonym counts per class. Never exposes values or mappings. */
  mappingStats(): MappingStats {
    const pseudonyms: Record<string, number> = {};
    for (const key of this.pseudonyms.keys()) {
      const cls = key.slice(0, key.indexOf('\u001f'));
      pseudonyms[cls] = (pseudonyms[cls] ?? 0) + 1;
    }
    return { pseudonyms, saltFingerprint: this.salt.fingerprint() };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private detect(text: string): DetectedSpan[] {
    const spans: DetectedSpan[] = [];
    for (const detector of this.detectors) {
      spans.push(...detector.detect(text));
    }
    for (const [start, end] of this.salt.locate(text)) {
      spans.push({ start, end, class: SECRET_CLASS, confidence: 1, value: text.slice(start, end) });
    }

    // Hard-fail classes bypass the confidence cut
    const confident = spans.filter(
      (s) =>
        (this.hardFailClasses.has(s.class) || s.confidence >= this.policy.minConfidence) &&
        s.start >= 0 &&
        s.end <= text.length,
    );
    return excludeRanges(confident, markerRanges(text));
  }

  private replacementFor(span: DetectedSpan): string | null {
    if (IDENTITY_CLASSES.has(span.class) && this.policy.pseudonymize) {
      return this.pseudonymFor(span.class, span.value);
    }
    if (this.policy.opaqueTokens || span.class === SECRET_CLASS) {
      const id8 = this.salt.keyedHash('tkn', span.value).slice(0, 8);
      return `⟦TKN:${markerClass(span.class)}:${id8}⟧`;
    }
    return null;
  }

  private pseudonymFor(cls: string, value: string): string {
    const normalized = normalizeIdentity(cls, value);
    const key = `${cls}\u001f${normalized}`;
    const existing = this.pseudonyms.get(key);
    if (existing !== undefined) return existing;

    const id8 = this.salt.keyedHash('psn', cls, normalized).slice(0, 8);
    const pseudonym = `⟦PSN:${markerClass(cls)}:${id8}⟧`;
    this.pseudonyms.set(key, pseudonym);
    return pseudonym;
  }

  private buildReport(
    fragmentId: string,
    parts: {
      coverage: number;
      hardfailClasses: string[];
      detected: readonly DetectedSpan[];
      redacted: number;
      notes: string[];
    },
  ): RedactionReport {
    const classCounts: Record<string, number> = {};
    for (const span of parts.detected) {
      classCounts[span.class] = (classCounts[span.class] ?? 0) + 1;
    }

    return deepFreeze({
      fragmentId,
      coverage: clampUnit(parts.coverage),
      strict: this.policy.strict,
      requiredCoverage: this.requiredCoverage,
      hardfailTriggered: parts.hardfailClasses.length > 0,
      hardfailClasses: parts.hardfailClasses,
      spansDetected: parts.detected.length,
      spansRedacted: parts.redacted,
      classCounts,
      detectorVersion: this.detectorVersion,
      notes: parts.notes,
    });
  }
}
