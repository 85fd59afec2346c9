/**
 * @veil/enrichment - Heuristic local analyzer
 *
 * Deterministic cue-based analysis used as the default on-device pass.
 * Confidence grows with the number of independent signals found
 * (speech act cue, emotion cue, stance cue, coarse label), so sparse or
 * heavily redacted fragments come out with low confidence and become
 * escalation candidates.
 */

import { readFileSync } from 'node:fs';
import {
  isPlainObject,
  type Emotion,
  type RedactedFragment,
  type RedactionReport,
  type SpeechAct,
  type Stance,
} from '@veil/core';
import { MARKER_PATTERN } from '@veil/privacy';
import { LabelPolicy, containsPhrase } from '../labels.js';
import type { LocalAnalysis, LocalAnalyzer } from './types.js';

interface CueLexicon {
  speechAct: Record<string, string[]>;
  emotion: Record<string, string[]>;
  stance: Record<string, string[]>;
}

function isKeywordRecord(value: unknown): value is Record<string, string[]> {
  return (
    isPlainObject(value) &&
    Object.values(value).every((v) => Array.isArray(v) && v.every((k) => typeof k === 'string'))
  );
}

function isCueLexicon(value: unknown): value is CueLexicon {
  return (
    isPlainObject(value) &&
    isKeywordRecord(value.speechAct) &&
    isKeywordRecord(value.emotion) &&
    isKeywordRecord(value.stance)
  );
}

let cachedCues: CueLexicon | null = null;

export function loadCues(): CueLexicon {
  if (cachedCues) return cachedCues;
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/cues.json', import.meta.url), 'utf-8'),
  );
  if (!isCueLexicon(raw)) {
    throw new Error('cues.json must map speechAct, emotion and stance to keyword lists');
  }
  cachedCues = raw;
  return cachedCues;
}

const SPEECH_ACT_ORDER: readonly SpeechAct[] = ['apologize', 'promise', 'refuse', 'propose', 'meta'];
const EMOTION_ORDER: readonly Emotion[] = ['joy', 'anger', 'fear', 'sadness', 'disgust', 'surprise'];
const QUESTION_START = /^(?:who|what|when|where|why|how|can|could|would|will|do|does|did|is|are)\b/;

const BASE_CONFIDENCE = 0.4;
const SIGNAL_WEIGHT = 0.12;
const MAX_CONFIDENCE = 0.9;
const SHORT_TEXT_PENALTY = 0.1;

function countHits(text: string, cues: readonly string[] | undefined): number {
  if (!cues) return 0;
  return cues.filter((cue) => containsPhrase(text, cue)).length;
}

export interface HeuristicAnalyzerOptions {
  modelId?: string;
  labels?: LabelPolicy;
}

export class HeuristicAnalyzer implements LocalAnalyzer {
  readonly modelId: string;
  private readonly labels: LabelPolicy;
  private readonly cues: CueLexicon;

  constructor(options: HeuristicAnalyzerOptions = {}) {
    this.modelId = options.modelId ?? 'local/heuristic-1';
    this.labels = options.labels ?? new LabelPolicy();
    this.cues = loadCues();
  }

  async analyze(fragment: RedactedFragment, report: RedactionReport): Promise<LocalAnalysis> {
    const text = fragment.text
      .replace(new RegExp(MARKER_PATTERN.source, 'g'), ' ')
      .toLowerCase()
      .replace(/\s+/g, ' ')
      .trim();

    let signals = 0;

    // Speech act: questions first, then cue lists in fixed order
    let speechAct: SpeechAct = 'inform';
    if (text.endsWith('?') || QUESTION_START.test(text)) {
      speechAct = 'ask';
      signals++;
    } else {
      const cued = SPEECH_ACT_ORDER.find((act) => countHits(text, this.cues.speechAct[act]) > 0);
      if (cued) {
        speechAct = cued;
        signals++;
      }
    }

    let emotionPrimary: Emotion = 'neutral';
    let bestEmotion = 0;
    for (const emotion of EMOTION_ORDER) {
      const hits = countHits(text, this.cues.emotion[emotion]);
      if (hits > bestEmotion) {
        bestEmotion = hits;
        emotionPrimary = emotion;
      }
    }
    if (bestEmotion > 0) signals++;

    const supportive = countHits(text, this.cues.stance.supportive);
    const challenging = countHits(text, this.cues.stance.challenging);
    let stance: Stance = 'neutral';
    if (supportive > challenging) stance = 'supportive';
    else if (challenging > supportive) stance = 'challenging';
    if (stance !== 'neutral') signals++;

    const coarseLabels = this.labels.coarseFromText(text);
    if (coarseLabels.length > 0) signals++;

    let confidence = Math.min(MAX_CONFIDENCE, BASE_CONFIDENCE + SIGNAL_WEIGHT * signals);
    const words = text.split(' ').filter((w) => /[a-z0-9]/.test(w)).length;
    if (words < 3) confidence -= SHORT_TEXT_PENALTY;

    const topic = coarseLabels[0];
    return {
      speechAct,
      emotionPrimary,
      stance,
      intent: topic ? `${speechAct} about ${topic}` : speechAct,
      coarseLabels,
      confidenceLlm: Math.round(Math.max(0, confidence) * 100) / 100,
      fineLabelsLocal: this.labels.fineFromReport(report),
    };
  }
}
