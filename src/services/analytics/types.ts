/**
 * Analytics - Type Definitions
 *
 * Shapes returned by the read-side endpoints. Field names are the wire names.
 */

import type { SentimentLabel } from '../../types';

export interface SentimentTotal {
  sentiment: SentimentLabel;
  count: number;
  avg_score: number;
}

/** One (brand, sentiment) cell of a grouped query */
export interface BrandSentimentCell {
  brand: string;
  sentiment: SentimentLabel;
  count: number;
  avg_score: number;
}

export interface BrandBreakdown {
  brand: string;
  sentiments: SentimentTotal[];
  /** Sum of sentiments[].count */
  total: number;
}

export interface TimelinePoint {
  /** YYYY-MM-DD, UTC */
  date: string;
  sentiment: SentimentLabel;
  count: number;
}

export interface HeatmapCell {
  /** 0-23, UTC */
  hour: number;
  /** 1 (Sunday) to 7 (Saturday) */
  day: number;
  sentiment: SentimentLabel;
  count: number;
}

export type KeywordCount = [keyword: string, count: number];

export interface KeywordAnalysis {
  positive_keywords: KeywordCount[];
  negative_keywords: KeywordCount[];
}
