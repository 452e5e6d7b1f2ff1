/**
 * Tweet Sentiment Analytics - Core Type Definitions
 */

// =============================================================================
// SENTIMENT
// =============================================================================

export type SentimentLabel = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL';

export const SENTIMENT_LABELS: readonly SentimentLabel[] = ['POSITIVE', 'NEGATIVE', 'NEUTRAL'];

/** Provenance tag: which provider produced a classification */
export type AnalysisMethod = 'HuggingFace' | 'TextBlob';

export interface SentimentResult {
  label: SentimentLabel;
  /** 0 to 1 */
  score: number;
  method: AnalysisMethod;
}

// =============================================================================
// RECORDS
// =============================================================================

/** A persisted tweet with its classification. Never mutated after insert. */
export interface LabeledRecord {
  id: string;
  text: string;
  sentiment_label: SentimentLabel;
  sentiment_score: number;
  analysis_method: AnalysisMethod;
  timestamp: Date;
  brand: string;
}

export type NewLabeledRecord = Omit<LabeledRecord, 'id'>;

export const DEFAULT_BRAND = 'default';

// =============================================================================
// CONFIG
// =============================================================================

export interface Config {
  gateway: {
    port: number;
    host: string;
  };
  storage: {
    /** sql.js database file. null keeps everything in memory. */
    path: string | null;
  };
  huggingface: {
    enabled: boolean;
    apiKey: string;
    model: string;
    baseUrl: string;
    timeoutMs: number;
  };
  analytics: {
    emotionSampleSize: number;
    keywordLimit: number;
  };
}
