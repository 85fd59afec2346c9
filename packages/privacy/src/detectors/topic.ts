/**
 * @veil/privacy - Sensitive-topic detector
 *
 * Keyword classifier over a bundled lexicon (health, substance use,
 * sexuality, finances, legal, religion). Matches are whole words or
 * whole phrases, case-insensitive.
 */

import { readFileSync } from 'node:fs';
import { isPlainObject } from '@veil/core';
import type { Detector, DetectedSpan } from './types.js';

export type TopicLexicon = Record<string, string[]>;

function isLexicon(value: unknown): value is TopicLexicon {
  if (!isPlainObject(value)) return false;
  return Object.values(value).every(
    (terms) => Array.isArray(terms) && terms.every((t) => typeof t === 'string' && t.length > 0),
  );
}

let cachedLexicon: TopicLexicon | null = null;

export function loadTopicLexicon(): TopicLexicon {
  if (cachedLexicon) return cachedLexicon;
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/topics.json', import.meta.url), 'utf-8'),
  );
  if (!isLexicon(raw)) {
    throw new Error('topics.json must map topic classes to keyword arrays');
  }
  cachedLexicon = raw;
  return cachedLexicon;
}

function escapeRegex(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface TopicDetectorOptions {
  /** Replaces the bundled lexicon. */
  lexicon?: TopicLexicon;
  confidence?: number;
}

export class TopicDetector implements Detector {
  readonly name = 'topic';
  readonly version = '1.0.0';
  readonly kind = 'topic' as const;

  private readonly matchers: Array<{ class: string; regex: RegExp }>;
  private readonly confidence: number;

  constructor(options: TopicDetectorOptions = {}) {
    const lexicon = options.lexicon ?? loadTopicLexicon();
    this.confidence = options.confidence ?? 0.75;

    // Longest phrases first so "panic attack" wins over a shorter term
    this.matchers = Object.entries(lexicon).map(([topic, terms]) => {
      const alternation = [...terms]
        .sort((a, b) => b.length - a.length)
        .map((t) => escapeRegex(t).replace(/\s+/g, '\\s+'))
        .join('|');
      return { class: topic, regex: new RegExp(`\\b(?:${alternation})\\b`, 'gi') };
    });
  }

  detect(text: string): DetectedSpan[] {
    const spans: DetectedSpan[] = [];

    for (const matcher of this.matchers) {
      matcher.regex.lastIndex = 0;
      let match: RegExpExecArray | null;
      while ((match = matcher.regex.exec(text)) !== null) {
        spans.push({
          start: match.index,
          end: match.index + match[0].length,
          class: matcher.class,
          confidence: this.confidence,
          value: match[0],
        });
      }
    }

    return spans;
  }
}
