/**
 * Shared response helpers for the REST routers
 */

import type { Response } from 'express';
import { logger } from '../utils/logger';
import { isValidationError, toErrorMessage } from '../utils/errors';

/** 400 for bad input, 500 (logged) for everything else */
export function sendError(res: Response, err: unknown, action: string): void {
  if (isValidationError(err)) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  logger.warn({ err }, `[gateway] ${action} failed`);
  res.status(500).json({ error: toErrorMessage(err) });
}

export function parsePositiveInt(value: unknown, fallback: number): number | null {
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return null;
  const parsed = parseInt(value, 10);
  return parsed > 0 && Number.isSafeInteger(parsed) ? parsed : null;
}
