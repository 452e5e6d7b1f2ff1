/**
 * Application context - the shared handles every component is built from
 *
 * Constructed once at start-up and passed down explicitly; closing it
 * releases the storage handle.
 */

import { initDatabase, type TweetStore } from './db';
import { logger } from './utils/logger';
import type { Config } from './types';
import {
  createHeuristicScorer,
  createHuggingFaceProvider,
  createSentimentResolver,
  type HeuristicScorer,
  type SentimentProvider,
  type SentimentResolver,
} from './services/sentiment';
import { createAnalyticsService, type AnalyticsService } from './services/analytics';

export interface AppContext {
  config: Config;
  store: TweetStore;
  scorer: HeuristicScorer;
  providers: SentimentProvider[];
  resolver: SentimentResolver;
  analytics: AnalyticsService;
  close(): void;
}

export interface AppContextOptions {
  /** Use an existing store instead of opening config.storage.path */
  store?: TweetStore;
  /** Replaces the configured provider chain (the heuristic fallback is always appended) */
  providers?: SentimentProvider[];
  fetch?: typeof fetch;
}

export function createProviders(config: Config, fetchImpl?: typeof fetch): SentimentProvider[] {
  const providers: SentimentProvider[] = [];
  const hf = config.huggingface;
  if (hf.enabled) {
    if (!hf.apiKey) {
      logger.warn('[sentiment] HUGGINGFACE_API_KEY not set, every tweet will use the heuristic scorer');
    }
    providers.push(
      createHuggingFaceProvider({
        apiKey: hf.apiKey,
        model: hf.model,
        baseUrl: hf.baseUrl,
        timeoutMs: hf.timeoutMs,
        fetch: fetchImpl,
      }),
    );
  }
  return providers;
}

export async function createAppContext(config: Config, options: AppContextOptions = {}): Promise<AppContext> {
  const store = options.store ?? (await initDatabase({ path: config.storage.path }));
  const scorer = createHeuristicScorer();
  const providers = options.providers ?? createProviders(config, options.fetch);
  const resolver = createSentimentResolver(providers, scorer);
  const analytics = createAnalyticsService({
    store,
    scorer,
    emotionSampleSize: config.analytics.emotionSampleSize,
    keywordLimit: config.analytics.keywordLimit,
  });

  logger.info(
    { providers: [...providers.map((p) => p.method), 'TextBlob'], storage: config.storage.path ?? 'memory' },
    '[context] Ready',
  );

  return {
    config,
    store,
    scorer,
    providers,
    resolver,
    analytics,
    close: () => store.close(),
  };
}
