/**
 * Analytics Service - read-side views over the stored corpus
 *
 * Every call reads the full matching record set; nothing is cached or
 * maintained incrementally, so results always reflect the store at call time.
 */

import type { TweetStore } from '../../db';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { analyzeEmotions, EMOTION_SAMPLE_SIZE } from '../sentiment/emotion';
import type { EmotionClassification, HeuristicScorer } from '../sentiment/types';
import { extractKeywords, KEYWORD_LIMIT } from './keywords';
import type {
  BrandBreakdown,
  BrandSentimentCell,
  HeatmapCell,
  KeywordAnalysis,
  SentimentTotal,
  TimelinePoint,
} from './types';

export type {
  BrandBreakdown,
  BrandSentimentCell,
  HeatmapCell,
  KeywordAnalysis,
  KeywordCount,
  SentimentTotal,
  TimelinePoint,
} from './types';

export interface AnalyticsService {
  sentimentTotals(): SentimentTotal[];
  brandBreakdown(): BrandBreakdown[];
  sentimentTimeline(): TimelinePoint[];
  sentimentHeatmap(): HeatmapCell[];
  /** Throws ValidationError when `brands` is not a non-empty list of strings */
  compareBrands(brands: unknown): BrandSentimentCell[];
  keywordAnalysis(): KeywordAnalysis;
  emotionAnalysis(): EmotionClassification[];
}

export interface AnalyticsServiceOptions {
  store: TweetStore;
  scorer: HeuristicScorer;
  emotionSampleSize?: number;
  keywordLimit?: number;
}

/** Re-group (brand, sentiment) cells per brand, keeping first-seen brand order */
export function groupByBrand(cells: readonly BrandSentimentCell[]): BrandBreakdown[] {
  const byBrand = new Map<string, BrandBreakdown>();
  for (const cell of cells) {
    let entry = byBrand.get(cell.brand);
    if (!entry) {
      entry = { brand: cell.brand, sentiments: [], total: 0 };
      byBrand.set(cell.brand, entry);
    }
    entry.sentiments.push({ sentiment: cell.sentiment, count: cell.count, avg_score: cell.avg_score });
    entry.total += cell.count;
  }
  return [...byBrand.values()];
}

export function parseBrandList(brands: unknown): string[] {
  if (!Array.isArray(brands) || brands.length === 0) {
    throw new ValidationError('No brands provided');
  }
  const parsed: string[] = [];
  for (const brand of brands) {
    if (typeof brand !== 'string') {
      throw new ValidationError('Brands must be strings');
    }
    parsed.push(brand);
  }
  return parsed;
}

export function createAnalyticsService(opts: AnalyticsServiceOptions): AnalyticsService {
  const { store, scorer } = opts;
  const emotionSampleSize = opts.emotionSampleSize ?? EMOTION_SAMPLE_SIZE;
  const keywordLimit = opts.keywordLimit ?? KEYWORD_LIMIT;

  function sentimentTotals(): SentimentTotal[] {
    return store.sentimentTotals();
  }

  function brandBreakdown(): BrandBreakdown[] {
    return groupByBrand(store.brandSentimentCells());
  }

  function sentimentTimeline(): TimelinePoint[] {
    return store.dailySentimentCounts();
  }

  function sentimentHeatmap(): HeatmapCell[] {
    return store.hourlySentimentCounts();
  }

  function compareBrands(brands: unknown): BrandSentimentCell[] {
    // Validated before any query runs
    const list = parseBrandList(brands);
    return store.brandSentimentCells(list);
  }

  function keywordAnalysis(): KeywordAnalysis {
    const records = store.find();
    logger.debug({ records: records.length }, '[analytics] Keyword scan');
    return extractKeywords(records, keywordLimit);
  }

  function emotionAnalysis(): EmotionClassification[] {
    return analyzeEmotions(store.find({ limit: emotionSampleSize }), scorer);
  }

  return {
    sentimentTotals,
    brandBreakdown,
    sentimentTimeline,
    sentimentHeatmap,
    compareBrands,
    keywordAnalysis,
    emotionAnalysis,
  };
}
