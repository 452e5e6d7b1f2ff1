/**
 * Sentiment Pipeline - Type Definitions
 *
 * Providers are tried in order by the resolver; the heuristic scorer closes
 * the chain and always answers.
 */

import type { AnalysisMethod, SentimentResult } from '../../types';

// ── Heuristic scoring ──────────────────────────────────────────────────────

export interface PolarityScores {
  /** -1 (negative) to +1 (positive) */
  polarity: number;
  /** 0 (factual) to 1 (opinion) */
  subjectivity: number;
}

export interface LexiconEntry {
  polarity: number;
  subjectivity: number;
}

export interface Lexicon {
  lookup(word: string): LexiconEntry | undefined;
  /** Intensity multiplier for modifier words such as "very" */
  intensity(word: string): number | undefined;
  isNegation(word: string): boolean;
}

export interface HeuristicScorer {
  /** Raw lexicon scores. Never throws; empty text scores 0/0. */
  score(text: string): PolarityScores;
  /** Banded classification. Never throws; faults degrade to NEUTRAL 0.5. */
  analyze(text: string): SentimentResult;
}

// ── Provider chain ─────────────────────────────────────────────────────────

/** A provider that may decline to answer (returns null) */
export interface SentimentProvider {
  readonly method: AnalysisMethod;
  classify(text: string): Promise<SentimentResult | null>;
}

export interface SentimentResolver {
  resolve(text: string): Promise<SentimentResult>;
}

// ── Emotions ───────────────────────────────────────────────────────────────

export type Emotion = 'Joy' | 'Anger' | 'Sadness' | 'Trust' | 'Surprise' | 'Neutral';

export interface EmotionRule {
  emotion: Emotion;
  matches(scores: PolarityScores): boolean;
}

export interface EmotionClassification {
  /** First 100 characters followed by "..." */
  text: string;
  emotion: Emotion;
  polarity: number;
  subjectivity: number;
  timestamp: Date;
}
