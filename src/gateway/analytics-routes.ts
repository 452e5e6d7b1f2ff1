/**
 * Analytics HTTP Routes - read-side views over the stored corpus
 *
 * None of these go through the sentiment resolver; they read stored labels
 * (or re-score stored text with the heuristic scorer, for emotions).
 */

import { Router, type Request, type Response } from 'express';
import type { AnalyticsService } from '../services/analytics';
import { sendError } from './http';

export interface AnalyticsRouterDeps {
  analytics: AnalyticsService;
}

export function createAnalyticsRouter(deps: AnalyticsRouterDeps): Router {
  const router = Router();
  const { analytics } = deps;

  // ── GET /api/sentiment_stats ──────────────────────────────────────────────
  router.get('/sentiment_stats', (_req: Request, res: Response) => {
    try {
      res.json(analytics.sentimentTotals());
    } catch (err) {
      sendError(res, err, 'Sentiment stats');
    }
  });

  // ── GET /api/brand_stats ──────────────────────────────────────────────────
  router.get('/brand_stats', (_req: Request, res: Response) => {
    try {
      res.json(analytics.brandBreakdown());
    } catch (err) {
      sendError(res, err, 'Brand stats');
    }
  });

  // ── GET /api/sentiment_timeline ───────────────────────────────────────────
  router.get('/sentiment_timeline', (_req: Request, res: Response) => {
    try {
      res.json(analytics.sentimentTimeline());
    } catch (err) {
      sendError(res, err, 'Sentiment timeline');
    }
  });

  // ── GET /api/emotion_analysis ─────────────────────────────────────────────
  router.get('/emotion_analysis', (_req: Request, res: Response) => {
    try {
      res.json(analytics.emotionAnalysis());
    } catch (err) {
      sendError(res, err, 'Emotion analysis');
    }
  });

  // ── GET /api/keyword_analysis ─────────────────────────────────────────────
  router.get('/keyword_analysis', (_req: Request, res: Response) => {
    try {
      res.json(analytics.keywordAnalysis());
    } catch (err) {
      sendError(res, err, 'Keyword analysis');
    }
  });

  // ── GET /api/sentiment_heatmap ────────────────────────────────────────────
  router.get('/sentiment_heatmap', (_req: Request, res: Response) => {
    try {
      res.json(analytics.sentimentHeatmap());
    } catch (err) {
      sendError(res, err, 'Sentiment heatmap');
    }
  });

  // ── POST /api/comparative_analysis ────────────────────────────────────────
  // Body: {brands: string[]}; an empty list is rejected with 400
  router.post('/comparative_analysis', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const brands = typeof body === 'object' && body !== null && 'brands' in body ? body.brands : undefined;
      res.json(analytics.compareBrands(brands));
    } catch (err) {
      sendError(res, err, 'Comparative analysis');
    }
  });

  return router;
}
