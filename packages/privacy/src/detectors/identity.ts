/**
 * @veil/privacy - Identity & structured-identifier detector
 *
 * Pattern-based scanner with confidence scoring. Identity classes
 * (person, phone, email, handle) are pseudonymized by the engine; the
 * rest (ssn, credit card, ip, url, street address, zip code, coordinates, date of
 * birth) are tokenized opaquely.
 */

import { readFileSync } from 'node:fs';
import { isPlainObject } from '@veil/core';
import { scanPatterns, type Detector, type DetectedSpan, type SpanPattern } from './types.js';

/** Classes replaced by stable pseudonyms when pseudonymization is on. */
export const IDENTITY_CLASSES: ReadonlySet<string> = new Set(['person', 'phone', 'email', 'handle']);

// ---------------------------------------------------------------------------
// Luhn algorithm for credit card validation
// ---------------------------------------------------------------------------

/**
 * Validate a number string with the Luhn algorithm.
 * Returns true if the checksum is valid.
 */
export function luhnCheck(digits: string): boolean {
  const stripped = digits.replace(/[\s-]/g, '');
  if (!/^\d+$/.test(stripped) || stripped.length < 2) return false;

  let sum = 0;
  let alternate = false;

  for (let i = stripped.length - 1; i >= 0; i--) {
    let n = Number(stripped.charAt(i));
    if (alternate) {
      n *= 2;
      if (n > 9) n -= 9;
    }
    sum += n;
    alternate = !alternate;
  }

  return sum % 10 === 0;
}

// ---------------------------------------------------------------------------
// Built-in patterns
// ---------------------------------------------------------------------------

const STRUCTURED_PATTERNS: SpanPattern[] = [
  {
    class: 'email',
    regex: /\b[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}\b/g,
    confidence: 0.95,
  },

  // Social handle, not the @ of an email address
  {
    class: 'handle',
    regex: /(?<![\w.@])@[A-Za-z0-9_]{2,30}\b/g,
    confidence: 0.8,
  },

  // US/NANP: (###) ###-####, ###-###-####, ### ### ####, +1##########
  {
    class: 'phone',
    regex: /(?<![\d\w])(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}(?!\d)/g,
    confidence: 0.85,
    validate: (match) => {
      const digits = match.replace(/\D/g, '');
      return digits.length === 10 || digits.length === 11 ? 0.85 : false;
    },
  },

  // International: +CC followed by 7-14 more digits in groups
  {
    class: 'phone',
    regex: /\+\d{1,3}(?:[-.\s]?\d{2,4}){2,4}(?!\d)/g,
    confidence: 0.75,
    validate: (match) => {
      const digits = match.replace(/\D/g, '');
      return digits.length >= 8 && digits.length <= 15 ? 0.75 : false;
    },
  },

  // SSN: ###-##-####
  {
    class: 'ssn',
    regex: /\b(?!000|666|9\d{2})\d{3}-(?!00)\d{2}-(?!0000)\d{4}\b/g,
    confidence: 0.95,
  },

  // Credit card: 13-19 digits with optional separators, Luhn validated
  {
    class: 'credit_card',
    regex: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{1,7}\b/g,
    confidence: 0.9,
    validate: (match) => {
      const digits = match.replace(/[\s-]/g, '');
      if (digits.length < 13 || digits.length > 19) return false;
      return luhnCheck(digits) ? 0.95 : false;
    },
  },

  {
    class: 'ip_address',
    regex: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g,
    confidence: 0.7,
    validate: (match) => {
      const octets = match.split('.').map(Number);
      if (!octets.every((o) => o >= 0 && o <= 255)) return false;
      if (match === '0.0.0.0' || match === '127.0.0.1') return false;
      return 0.7;
    },
  },

  {
    class: 'url',
    regex: /\bhttps?:\/\/[^\s<>"'⟦⟧]+/gi,
    confidence: 0.9,
  },

  {
    class: 'street_address',
    regex:
      /\b\d{1,6}\s+(?:[A-Z][a-z]+\s+){1,4}(?:Street|St|Avenue|Ave|Road|Rd|Lane|Ln|Drive|Dr|Court|Ct|Place|Pl|Boulevard|Blvd)\b\.?/g,
    confidence: 0.85,
  },

  // ZIP after a state code or a "zip" label: "CA 94110", "zip: 10001-1234"
  {
    class: 'zip_code',
    regex: /\b(?:[A-Z]{2}|[Zz][Ii][Pp](?:\s*[Cc]ode)?|[Pp]ostal [Cc]ode)\s*:?\s*(\d{5}(?:-\d{4})?)\b/g,
    confidence: 0.75,
    group: 1,
  },

  {
    class: 'coordinates',
    regex: /[-+]?\b\d{1,2}\.\d{3,},\s*[-+]?\d{1,3}\.\d{3,}\b/g,
    confidence: 0.85,
  },

  // Date of birth only in context; bare dates are not sensitive on their own
  {
    class: 'date_of_birth',
    regex: /\b(?:birthday|born on|birth date|dob)\s*(?:is|:)?\s*(\d{1,2}[\/-]\d{1,2}(?:[\/-]\d{2,4})?)/gi,
    confidence: 0.8,
    group: 1,
  },
];

// Self-introductions: "I'm John", "my name is Sarah", "this is Omar"
const INTRODUCTION_PATTERNS: SpanPattern[] = [
  {
    class: 'person',
    regex: /\b(?:[Mm]y name is|[Ii]'m|[Ii]’m|[Ii] am|[Tt]his is|[Cc]all me)\s+([A-Z][a-z]{1,29})\b/g,
    confidence: 0.85,
    group: 1,
  },
];

// ---------------------------------------------------------------------------
// Name list
// ---------------------------------------------------------------------------

interface NameList {
  first: string[];
  last: string[];
}

function isNameList(value: unknown): value is NameList {
  if (!isPlainObject(value)) return false;
  const { first, last } = value;
  return (
    Array.isArray(first) && first.every((n) => typeof n === 'string') &&
    Array.isArray(last) && last.every((n) => typeof n === 'string')
  );
}

let cachedNames: ReadonlySet<string> | null = null;

/**
 * Load the bundled common-name list (lowercase).
 */
export function loadNameList(): ReadonlySet<string> {
  if (cachedNames) return cachedNames;
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/names.json', import.meta.url), 'utf-8'),
  );
  if (!isNameList(raw)) {
    throw new Error('names.json must contain "first" and "last" string arrays');
  }
  cachedNames = new Set([...raw.first, ...raw.last].map((n) => n.toLowerCase()));
  return cachedNames;
}

// ---------------------------------------------------------------------------
// IdentityDetector
// ---------------------------------------------------------------------------

export interface IdentityDetectorOptions {
  /** Detect capitalised words found in the common-name list. Default true. */
  includeNames?: boolean;
  /** Extra patterns appended after the built-ins. */
  extraPatterns?: SpanPattern[];
}

export class IdentityDetector implements Detector {
  readonly name = 'identity';
  readonly version = '1.2.0';
  readonly kind = 'identity' as const;

  private readonly patterns: SpanPattern[];
  private readonly names: ReadonlySet<string> | null;

  constructor(options: IdentityDetectorOptions = {}) {
    this.patterns = [...STRUCTURED_PATTERNS, ...INTRODUCTION_PATTERNS, ...(options.extraPatterns ?? [])];
    this.names = options.includeNames === false ? null : loadNameList();
  }

  detect(text: string): DetectedSpan[] {
    const spans = scanPatterns(text, this.patterns);

    if (this.names) {
      const wordRe = /\b[A-Z][a-z]+\b/g;
      let match: RegExpExecArray | null;
      while ((match = wordRe.exec(text)) !== null) {
        if (this.names.has(match[0].toLowerCase())) {
          spans.push({
            start: match.index,
            end: match.index + match[0].length,
            class: 'person',
            confidence: 0.7,
            value: match[0],
          });
        }
      }
    }

    return spans;
  }
}
