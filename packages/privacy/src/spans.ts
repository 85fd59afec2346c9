/**
 * @veil/privacy - Span filtering and overlap resolution
 */

import type { DetectedSpan } from './detectors/types.js';

/** Matches a pseudonym or opaque token emitted by the engine. */
export const MARKER_PATTERN = /⟦(?:PSN|TKN):[A-Z0-9_]+:[a-f0-9]{8}⟧/g;

/**
 * Ranges of markers already present in `text`. Spans inside them are
 * ignored, so redacting redacted text is a no-op.
 */
export function markerRanges(text: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  const regex = new RegExp(MARKER_PATTERN.source, 'g');
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    ranges.push([match.index, match.index + match[0].length]);
  }
  return ranges;
}

export function overlaps(a: { start: number; end: number }, b: { start: number; end: number }): boolean {
  return a.start < b.end && b.start < a.end;
}

/** Drop spans that intersect any of the given ranges. */
export function excludeRanges(spans: DetectedSpan[], ranges: Array<[number, number]>): DetectedSpan[] {
  if (ranges.length === 0) return spans;
  return spans.filter((span) => !ranges.some(([start, end]) => overlaps(span, { start, end })));
}

/**
 * Greedy interval selection: highest confidence first (ties broken by
 * longer span, then earlier start); a span is kept only if it does not
 * overlap anything already kept. Result is sorted by start offset.
 */
export function resolveOverlaps(spans: readonly DetectedSpan[]): DetectedSpan[] {
  const ranked = [...spans].sort(
    (a, b) =>
      b.confidence - a.confidence ||
      (b.end - b.start) - (a.end - a.start) ||
      a.start - b.start,
  );

  const kept: DetectedSpan[] = [];
  for (const span of ranked) {
    if (span.end <= span.start) continue;
    if (!kept.some((k) => overlaps(k, span))) {
      kept.push(span);
    }
  }

  return kept.sort((a, b) => a.start - b.start);
}
