/**
 * Sentiment Resolver - ordered provider chain with a guaranteed fallback
 *
 * Providers are asked in order; the first non-null answer is returned as is.
 * When every provider declines (or throws), the heuristic scorer answers, so
 * resolve() always produces a result.
 */

import { logger } from '../../utils/logger';
import type { SentimentResult } from '../../types';
import type { HeuristicScorer, SentimentProvider, SentimentResolver } from './types';

export function createSentimentResolver(
  providers: readonly SentimentProvider[],
  fallback: HeuristicScorer,
): SentimentResolver {
  async function resolve(text: string): Promise<SentimentResult> {
    for (const provider of providers) {
      try {
        const result = await provider.classify(text);
        if (result) return result;
      } catch (err) {
        logger.warn({ err, method: provider.method }, '[sentiment] Provider threw, trying next');
      }
    }

    logger.debug({ providers: providers.map((p) => p.method) }, '[sentiment] Falling back to heuristic scorer');
    return fallback.analyze(text);
  }

  return { resolve };
}
