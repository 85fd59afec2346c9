/**
 * @veil/privacy - Detector contract
 *
 * A detector scans text and yields spans. Detectors are assembled once,
 * in order, when the RedactionEngine is constructed.
 */

export type DetectorKind = 'identity' | 'topic' | 'hardfail';

export interface DetectedSpan {
  /** Inclusive start offset (UTF-16 code units). */
  start: number;
  /** Exclusive end offset. */
  end: number;
  /** Sensitive class, lower snake case (e.g. "phone", "health"). */
  class: string;
  confidence: number;
  /** The matched text. Never logged or emitted. */
  value: string;
}

export interface Detector {
  readonly name: string;
  readonly version: string;
  readonly kind: DetectorKind;
  detect(text: string): DetectedSpan[];
}

/**
 * Regex-backed pattern. `group` selects the capture group that holds the
 * sensitive value (default: the whole match).
 */
export interface SpanPattern {
  class: string;
  regex: RegExp;
  confidence: number;
  group?: number;
  /** Refine confidence, or return false to reject the match. */
  validate?: (value: string) => number | false;
}

/**
 * Run a list of patterns over `text` and collect every accepted match.
 */
export function scanPatterns(text: string, patterns: readonly SpanPattern[]): DetectedSpan[] {
  const spans: DetectedSpan[] = [];

  for (const pattern of patterns) {
    // Fresh instance per scan so lastIndex state never leaks between calls
    const flags = pattern.regex.flags.includes('g') ? pattern.regex.flags : pattern.regex.flags + 'g';
    const regex = new RegExp(pattern.regex.source, flags);
    let match: RegExpExecArray | null;

    while ((match = regex.exec(text)) !== null) {
      if (match[0].length === 0) {
        regex.lastIndex++;
        continue;
      }

      const value = pattern.group !== undefined ? match[pattern.group] : match[0];
      if (value === undefined || value.length === 0) continue;

      const offset = pattern.group !== undefined ? match[0].indexOf(value) : 0;
      const start = match.index + offset;

      let confidence = pattern.confidence;
      if (pattern.validate) {
        const result = pattern.validate(value);
        if (result === false) continue;
        confidence = result;
      }

      spans.push({ start, end: start + value.length, class: pattern.class, confidence, value });
    }
  }

  return spans;
}
