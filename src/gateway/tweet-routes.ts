/**
 * Tweet HTTP Routes - classify-and-store plus paginated listing
 *
 * POST /add_tweet   {text, brand?} -> stored Labeled Record
 * GET  /api/tweets  ?page=1&limit=10, newest first
 */

import { Router, type Request, type Response } from 'express';
import { logger } from '../utils/logger';
import { ValidationError } from '../utils/errors';
import { DEFAULT_BRAND, type NewLabeledRecord } from '../types';
import type { TweetStore } from '../db';
import type { SentimentResolver } from '../services/sentiment';
import { parsePositiveInt, sendError } from './http';

export interface TweetRouterDeps {
  store: TweetStore;
  resolver: SentimentResolver;
}

const DEFAULT_PAGE_SIZE = 10;

function readText(body: unknown): string {
  const text = typeof body === 'object' && body !== null && 'text' in body ? body.text : undefined;
  if (typeof text !== 'string' || text.trim() === '') {
    throw new ValidationError('Tweet text is required');
  }
  return text;
}

function readBrand(body: unknown): string {
  const brand = typeof body === 'object' && body !== null && 'brand' in body ? body.brand : undefined;
  if (brand === undefined || brand === null) return DEFAULT_BRAND;
  if (typeof brand !== 'string') {
    throw new ValidationError('Brand must be a string');
  }
  // Stored as sent so comparisons match it exactly; only a blank brand is replaced
  return brand.trim() === '' ? DEFAULT_BRAND : brand;
}

export function createTweetRouter(deps: TweetRouterDeps): Router {
  const router = Router();
  const { store, resolver } = deps;

  // ── POST /add_tweet ───────────────────────────────────────────────────────
  router.post('/add_tweet', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const text = readText(body);
      const brand = readBrand(body);

      const sentiment = await resolver.resolve(text);
      const record: NewLabeledRecord = {
        text,
        sentiment_label: sentiment.label,
        sentiment_score: sentiment.score,
        analysis_method: sentiment.method,
        timestamp: new Date(),
        brand,
      };

      const stored = store.insertOne(record);
      logger.debug(
        { id: stored.id, brand, label: stored.sentiment_label, method: stored.analysis_method },
        '[gateway] Tweet stored',
      );
      res.json(stored);
    } catch (err) {
      sendError(res, err, 'Add tweet');
    }
  });

  // ── GET /api/tweets ───────────────────────────────────────────────────────
  router.get('/api/tweets', (req: Request, res: Response) => {
    try {
      const page = parsePositiveInt(req.query.page, 1);
      const limit = parsePositiveInt(req.query.limit, DEFAULT_PAGE_SIZE);
      if (page === null || limit === null) {
        throw new ValidationError('page and limit must be positive integers');
      }
      const skip = (page - 1) * limit;
      if (!Number.isSafeInteger(skip)) {
        throw new ValidationError('page is out of range');
      }
      res.json(store.find({ sort: 'newest', skip, limit }));
    } catch (err) {
      sendError(res, err, 'List tweets');
    }
  });

  return router;
}
