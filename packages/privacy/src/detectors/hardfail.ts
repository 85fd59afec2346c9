/**
 * @veil/privacy - Prohibited-content detector
 *
 * Flags content classes that must never be analysed further. Whether a
 * class actually halts a fragment is decided by the policy's
 * `hardFailClasses`; classes outside that list are tokenized like any
 * other sensitive span.
 */

import { scanPatterns, type Detector, type DetectedSpan, type SpanPattern } from './types.js';

const HARDFAIL_PATTERNS: SpanPattern[] = [
  {
    class: 'explicit_violence',
    regex: /\b(?:kill|murder|hurt|harm)\s+(?:someone|people|kids|children)\b/gi,
    confidence: 0.9,
  },
  {
    class: 'explicit_violence',
    regex: /\b(?:bomb|explosive|weapon)\s+(?:making|building|creating)\b/gi,
    confidence: 0.9,
  },
  {
    class: 'illegal_drugs',
    regex: /\b(?:selling|buying|dealing)\s+(?:cocaine|heroin|meth|drugs)\b/gi,
    confidence: 0.9,
  },
  {
    class: 'illegal_drugs',
    regex: /\b(?:drug deal(?:ing)?|trafficking|smuggling)\b/gi,
    confidence: 0.85,
  },
  {
    class: 'csam_indicators',
    regex: /\b(?:child|kid|minor)\s+(?:inappropriate|sexual|explicit)\b/gi,
    confidence: 0.95,
  },
  {
    class: 'csam_indicators',
    regex: /\b(?:underage|illegal)\s+(?:content|material|images)\b/gi,
    confidence: 0.95,
  },
];

export class HardFailDetector implements Detector {
  readonly name = 'hardfail';
  readonly version = '1.0.0';
  readonly kind = 'hardfail' as const;

  detect(text: string): DetectedSpan[] {
    return scanPatterns(text, HARDFAIL_PATTERNS);
  }
}
