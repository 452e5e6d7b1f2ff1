/**
 * Heuristic Sentiment Scorer - lexicon-based polarity and subjectivity
 *
 * Each token found in the lexicon contributes a (polarity, subjectivity) pair;
 * the text scores the mean of those pairs. A modifier ("very") scales the next
 * scored word, a negation ("not") directly before it flips and halves its
 * polarity, and "!" after it boosts polarity by 25%.
 *
 * Always available: any fault degrades to a neutral result instead of throwing.
 */

import { logger } from '../../utils/logger';
import type { SentimentResult } from '../../types';
import { getDefaultLexicon } from './lexicon';
import type { HeuristicScorer, Lexicon, PolarityScores } from './types';

export const HEURISTIC_METHOD = 'TextBlob' as const;

/** |polarity| must exceed this to leave the neutral band */
export const POLARITY_THRESHOLD = 0.1;
export const NEUTRAL_SCORE = 0.5;

const NEGATION_FACTOR = -0.5;
const EXCLAMATION_FACTOR = 1.25;

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:'[\p{L}]+)?|!/gu;

const NEUTRAL_RESULT: SentimentResult = { label: 'NEUTRAL', score: NEUTRAL_SCORE, method: HEURISTIC_METHOD };

interface Assessment {
  polarity: number;
  subjectivity: number;
  /** Token index of the scored word (or of the last "!" that boosted it) */
  index: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().replace(/[‘’]/g, "'").match(TOKEN_PATTERN) ?? [];
}

/**
 * Map a polarity onto a label.
 * polarity > 0.1 -> POSITIVE, < -0.1 -> NEGATIVE, scored by |polarity|;
 * anything else is NEUTRAL with a fixed 0.5.
 */
export function labelFromPolarity(polarity: number): SentimentResult {
  if (polarity > POLARITY_THRESHOLD) {
    return { label: 'POSITIVE', score: Math.abs(polarity), method: HEURISTIC_METHOD };
  }
  if (polarity < -POLARITY_THRESHOLD) {
    return { label: 'NEGATIVE', score: Math.abs(polarity), method: HEURISTIC_METHOD };
  }
  return { ...NEUTRAL_RESULT };
}

export function scorePolarity(text: string, lexicon: Lexicon): PolarityScores {
  const tokens = tokenize(text);
  const assessments: Assessment[] = [];
  let intensity = 1;
  let negated = false;

  const scoresNext = (i: number): boolean => {
    const next = tokens[i + 1];
    return next !== undefined && (lexicon.lookup(next) !== undefined || lexicon.intensity(next) !== undefined);
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;

    if (token === '!') {
      const last = assessments[assessments.length - 1];
      if (last && last.index === i - 1) {
        last.polarity = clamp(last.polarity * EXCLAMATION_FACTOR, -1, 1);
        last.index = i;
      }
      continue;
    }

    if (lexicon.isNegation(token)) {
      negated = true;
      intensity = 1;
      continue;
    }

    const modifier = lexicon.intensity(token);
    if (modifier !== undefined && scoresNext(i)) {
      intensity *= modifier;
      continue;
    }

    const entry = lexicon.lookup(token);
    if (entry) {
      let polarity = clamp(entry.polarity * intensity, -1, 1);
      if (negated) polarity *= NEGATION_FACTOR;
      assessments.push({
        polarity,
        subjectivity: clamp(entry.subjectivity * intensity, 0, 1),
        index: i,
      });
    }

    intensity = 1;
    negated = false;
  }

  if (assessments.length === 0) {
    return { polarity: 0, subjectivity: 0 };
  }

  const polarity = assessments.reduce((sum, a) => sum + a.polarity, 0) / assessments.length;
  const subjectivity = assessments.reduce((sum, a) => sum + a.subjectivity, 0) / assessments.length;
  return {
    polarity: clamp(polarity, -1, 1),
    subjectivity: clamp(subjectivity, 0, 1),
  };
}

export function createHeuristicScorer(lexicon: Lexicon = getDefaultLexicon()): HeuristicScorer {
  function score(text: string): PolarityScores {
    try {
      return scorePolarity(text, lexicon);
    } catch (err) {
      logger.warn({ err }, '[sentiment] Heuristic scoring failed, treating text as neutral');
      return { polarity: 0, subjectivity: 0 };
    }
  }

  function analyze(text: string): SentimentResult {
    try {
      return labelFromPolarity(scorePolarity(text, lexicon).polarity);
    } catch (err) {
      logger.warn({ err }, '[sentiment] Heuristic analysis failed, falling back to neutral');
      return { ...NEUTRAL_RESULT };
    }
  }

  return { score, analyze };
}
