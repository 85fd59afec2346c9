/**
 * @veil/enrichment - Label taxonomy and remote payloads
 *
 * Coarse labels are safe to send off-device; fine labels are local-only.
 * A remote payload is built from redacted text and coarse labels alone,
 * then scanned for anything local-only before it may be sent.
 */

import { readFileSync } from 'node:fs';
import {
  isPlainObject,
  type EnrichmentRecord,
  type RedactedFragment,
  type RedactionReport,
} from '@veil/core';

// ---------------------------------------------------------------------------
// Taxonomy
// ---------------------------------------------------------------------------

export interface LabelTaxonomy {
  coarse: string[];
  fine: string[];
  /** Redaction class -> fine label it implies. */
  classToFine: Record<string, string>;
  /** Coarse label -> keywords that suggest it. */
  coarseKeywords: Record<string, string[]>;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isPlainObject(value) && Object.values(value).every((v) => typeof v === 'string');
}

function isKeywordRecord(value: unknown): value is Record<string, string[]> {
  return isPlainObject(value) && Object.values(value).every(isStringArray);
}

export function isLabelTaxonomy(value: unknown): value is LabelTaxonomy {
  return (
    isPlainObject(value) &&
    isStringArray(value.coarse) &&
    isStringArray(value.fine) &&
    isStringRecord(value.classToFine) &&
    isKeywordRecord(value.coarseKeywords)
  );
}

let cachedTaxonomy: LabelTaxonomy | null = null;

/** Load the bundled taxonomy (data/labels.json). */
export function loadTaxonomy(): LabelTaxonomy {
  if (cachedTaxonomy) return cachedTaxonomy;
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../data/labels.json', import.meta.url), 'utf-8'),
  );
  if (!isLabelTaxonomy(raw)) {
    throw new Error('labels.json does not match the label taxonomy shape');
  }
  cachedTaxonomy = raw;
  return cachedTaxonomy;
}

// ---------------------------------------------------------------------------
// LabelPolicy
// ---------------------------------------------------------------------------

export class LabelPolicy {
  readonly taxonomy: LabelTaxonomy;
  private readonly coarse: ReadonlySet<string>;
  private readonly fine: ReadonlySet<string>;

  constructor(taxonomy: LabelTaxonomy = loadTaxonomy()) {
    this.taxonomy = taxonomy;
    this.coarse = new Set(taxonomy.coarse.map((l) => l.toLowerCase()));
    this.fine = new Set(taxonomy.fine.map((l) => l.toLowerCase()));

    const both = [...this.coarse].filter((l) => this.fine.has(l));
    if (both.length > 0) {
      throw new Error(`Labels cannot be both coarse and fine: ${both.join(', ')}`);
    }
  }

  isCoarse(label: string): boolean {
    return this.coarse.has(label.toLowerCase());
  }

  isFine(label: string): boolean {
    return this.fine.has(label.toLowerCase());
  }

  /** Keep only known coarse labels, lowercased and de-duplicated. */
  coarseOnly(labels: readonly string[]): string[] {
    return [...new Set(labels.map((l) => l.toLowerCase()).filter((l) => this.coarse.has(l)))];
  }

  /** Fine labels implied by the classes a redaction report counted. */
  fineFromReport(report: RedactionReport): string[] {
    const labels = new Set<string>();
    for (const cls of Object.keys(report.classCounts)) {
      const fine = this.taxonomy.classToFine[cls];
      if (fine !== undefined) labels.add(fine);
    }
    return [...labels].sort();
  }

  /** Coarse labels whose keywords occur in `text`. */
  coarseFromText(text: string): string[] {
    const lower = text.toLowerCase();
    const labels: string[] = [];
    for (const [label, keywords] of Object.entries(this.taxonomy.coarseKeywords)) {
      if (this.coarse.has(label) && keywords.some((k) => containsPhrase(lower, k))) {
        labels.push(label);
      }
    }
    return labels.sort();
  }
}

/** Whole-word/phrase containment on lowercased text. */
export function containsPhrase(lowerText: string, phrase: string): boolean {
  const escaped = phrase.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?:^|[^a-z0-9'])${escaped}(?![a-z0-9])`).test(lowerText);
}

// ---------------------------------------------------------------------------
// Remote payload
// ---------------------------------------------------------------------------

/** Everything a remote analyzer ever sees. */
export interface RemotePayload {
  fragmentId: string;
  conversationId: string;
  sessionId: string;
  text: string;
  coarseLabels: string[];
  schemaVersion: string;
}

export function buildRemotePayload(
  fragment: RedactedFragment,
  local: EnrichmentRecord,
  labels: LabelPolicy,
  schemaVersion: string,
): RemotePayload {
  return {
    fragmentId: fragment.fragmentId,
    conversationId: fragment.conversationId,
    sessionId: fragment.sessionId,
    text: fragment.text,
    coarseLabels: labels.coarseOnly(local.coarseLabels),
    schemaVersion,
  };
}

const FORBIDDEN_KEYS: ReadonlySet<string> = new Set(['fineLabelsLocal', 'attachments']);

/**
 * Walk a remote-bound value and report every forbidden field: the
 * local-only label field, attachment references, and fine label values
 * in any label list. Returns JSON-pointer style paths.
 */
export function findForbiddenFields(value: unknown, labels: LabelPolicy, path = ''): string[] {
  const violations: string[] = [];

  if (Array.isArray(value)) {
    value.forEach((item, i) => {
      if (typeof item === 'string' && labels.isFine(item)) {
        violations.push(`${path}/${i}`);
      } else {
        violations.push(...findForbiddenFields(item, labels, `${path}/${i}`));
      }
    });
    return violations;
  }

  if (isPlainObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      const childPath = `${path}/${key}`;
      if (FORBIDDEN_KEYS.has(key)) {
        violations.push(childPath);
        continue;
      }
      violations.push(...findForbiddenFields(child, labels, childPath));
    }
  }

  return violations;
}
