/**
 * Emotion Classifier
 *
 * Buckets a (polarity, subjectivity) pair into one of six emotions. The rules
 * are evaluated top to bottom and the first match wins, so their order is part
 * of the contract: (0.6, 0.8) is Joy, not Surprise.
 */

import type { LabeledRecord } from '../../types';
import type { Emotion, EmotionClassification, EmotionRule, HeuristicScorer, PolarityScores } from './types';

export const EMOTION_SAMPLE_SIZE = 50;
const EXCERPT_LENGTH = 100;

export const EMOTION_RULES: readonly EmotionRule[] = [
  { emotion: 'Joy', matches: ({ polarity, subjectivity }) => polarity > 0.5 && subjectivity > 0.5 },
  { emotion: 'Anger', matches: ({ polarity, subjectivity }) => polarity < -0.5 && subjectivity > 0.5 },
  { emotion: 'Sadness', matches: ({ polarity, subjectivity }) => polarity < -0.3 && subjectivity < 0.5 },
  { emotion: 'Trust', matches: ({ polarity, subjectivity }) => polarity > 0.3 && subjectivity < 0.3 },
  { emotion: 'Surprise', matches: ({ subjectivity }) => subjectivity > 0.7 },
];

export function classifyEmotion(polarity: number, subjectivity: number): Emotion {
  const scores: PolarityScores = { polarity, subjectivity };
  for (const rule of EMOTION_RULES) {
    if (rule.matches(scores)) return rule.emotion;
  }
  return 'Neutral';
}

/** First 100 code points; an astral character is never split */
export function excerpt(text: string): string {
  return `${Array.from(text).slice(0, EXCERPT_LENGTH).join('')}...`;
}

/**
 * Re-score records with the heuristic scorer and bucket each one.
 * Polarity/subjectivity are not stored, so they are recomputed on every call;
 * callers pass a bounded sample (EMOTION_SAMPLE_SIZE by default).
 */
export function analyzeEmotions(
  records: readonly LabeledRecord[],
  scorer: HeuristicScorer,
): EmotionClassification[] {
  return records.map((record) => {
    const { polarity, subjectivity } = scorer.score(record.text);
    return {
      text: excerpt(record.text),
      emotion: classifyEmotion(polarity, subjectivity),
      polarity,
      subjectivity,
      timestamp: record.timestamp,
    };
  });
}
