/**
 * Logger - pino, structured fields first then the message
 */

// .env must be applied before the level is read; every module reaches the logger first
import 'dotenv/config';
import pino from 'pino';

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL?.trim() || 'info';
}

export const logger = pino({
  name: 'sentiment-analytics',
  level: resolveLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
});
