/**
 * Unit Tests for the HeuristicAnalyzer (local analysis)
 */
import { describe, it, expect } from 'vitest';
import type { RedactedFragment, RedactionReport } from '@veil/core';
import { HeuristicAnalyzer, estimateTokens, loadCues } from '@veil/enrichment';

const fragment = (text: string): RedactedFragment => ({
  fragmentId: 'f1',
  conversationId: 'c1',
  sessionId: 's1',
  text,
  timestamp: '2024-05-01T12:00:00Z',
  detectorVersion: 'test@1.0.0',
});

const report = (classCounts: Record<string, number> = {}): RedactionReport => ({
  fragmentId: 'f1',
  coverage: 1,
  strict: false,
  requiredCoverage: 0.995,
  hardfailTriggered: false,
  hardfailClasses: [],
  spansDetected: 0,
  spansRedacted: 0,
  classCounts,
  detectorVersion: 'test@1.0.0',
  notes: [],
});

describe('HeuristicAnalyzer', () => {
  const analyzer = new HeuristicAnalyzer();

  it('uses the default model id', () => {
    expect(analyzer.modelId).toBe('local/heuristic-1');
    expect(new HeuristicAnalyzer({ modelId: 'local/custom' }).modelId).toBe('local/custom');
  });

  it('loads the cue lexicon', () => {
    expect(loadCues().speechAct.apologize).toContain('sorry');
  });

  it('reads questions as asks', async () => {
    const result = await analyzer.analyze(fragment('Can we meet tomorrow?'), report());
    expect(result).toEqual({
      speechAct: 'ask',
      emotionPrimary: 'neutral',
      stance: 'neutral',
      intent: 'ask about planning',
      coarseLabels: ['planning'],
      confidenceLlm: 0.64,
      fineLabelsLocal: [],
    });
  });

  it('combines speech act, emotion and labels', async () => {
    const result = await analyzer.analyze(fragment('sorry I was late, I love you'), report({ health: 1 }));
    expect(result).toEqual({
      speechAct: 'apologize',
      emotionPrimary: 'joy',
      stance: 'neutral',
      intent: 'apologize about care',
      coarseLabels: ['care', 'time'],
      confidenceLlm: 0.76,
      fineLabelsLocal: ['mental_health_specific'],
    });
  });

  it('grows confidence with each independent signal', async () => {
    const result = await analyzer.analyze(
      fragment("Sorry!! I'm so happy, you're right, can't wait for the party tomorrow"),
      report(),
    );
    expect(result.speechAct).toBe('apologize');
    expect(result.stance).toBe('supportive');
    expect(result.coarseLabels).toEqual(['planning', 'social']);
    expect(result.intent).toBe('apologize about planning');
    expect(result.confidenceLlm).toBe(0.88);
  });

  it('reads supportive stance', async () => {
    const result = await analyzer.analyze(fragment('I agree, sounds good'), report());
    expect(result.speechAct).toBe('inform');
    expect(result.stance).toBe('supportive');
    expect(result.intent).toBe('inform');
    expect(result.confidenceLlm).toBe(0.52);
  });

  it('breaks emotion ties by fixed order', async () => {
    const result = await analyzer.analyze(fragment('wow I am so happy but also angry'), report());
    expect(result.emotionPrimary).toBe('joy');
  });

  it('gives short fragments low confidence', async () => {
    const result = await analyzer.analyze(fragment('ok'), report());
    expect(result.speechAct).toBe('inform');
    expect(result.emotionPrimary).toBe('neutral');
    expect(result.confidenceLlm).toBe(0.3);
  });

  it('ignores redaction markers in the text', async () => {
    const result = await analyzer.analyze(fragment('⟦PSN:PERSON:ab12cd34⟧ said sorry'), report({ person: 1 }));
    expect(result.speechAct).toBe('apologize');
    expect(result.intent).toBe('apologize');
    expect(result.confidenceLlm).toBe(0.42);
    expect(result.fineLabelsLocal).toEqual([]);
  });
});

describe('estimateTokens', () => {
  it('uses roughly four characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});
