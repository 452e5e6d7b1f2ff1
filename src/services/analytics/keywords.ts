/**
 * Keyword Extractor - frequency-ranked words per sentiment class
 *
 * Full-corpus scan: cost grows with the total stored text length.
 */

import type { LabeledRecord } from '../../types';
import type { KeywordAnalysis, KeywordCount } from './types';

export const KEYWORD_LIMIT = 10;
/** Tokens this long or shorter are dropped */
export const MAX_SKIPPED_LENGTH = 3;

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export function extractWords(text: string): string[] {
  const words = text.toLowerCase().match(WORD_PATTERN) ?? [];
  // Length in code points, not UTF-16 units
  return words.filter((word) => [...word].length > MAX_SKIPPED_LENGTH);
}

/**
 * Top `limit` entries by count. Map iteration follows first-insertion order
 * and Array#sort is stable, so ties keep first-encountered order.
 */
export function mostCommon(counts: Map<string, number>, limit: number): KeywordCount[] {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}

export function extractKeywords(records: Iterable<LabeledRecord>, limit: number = KEYWORD_LIMIT): KeywordAnalysis {
  const positive = new Map<string, number>();
  const negative = new Map<string, number>();

  for (const record of records) {
    const target =
      record.sentiment_label === 'POSITIVE' ? positive : record.sentiment_label === 'NEGATIVE' ? negative : null;
    if (!target) continue;

    for (const word of extractWords(record.text)) {
      target.set(word, (target.get(word) ?? 0) + 1);
    }
  }

  return {
    positive_keywords: mostCommon(positive, limit),
    negative_keywords: mostCommon(negative, limit),
  };
}
