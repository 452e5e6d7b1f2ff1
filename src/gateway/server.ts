/**
 * HTTP server
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer as createHttpServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import { logger } from '../utils/logger';
import type { Config } from '../types';
import type { AppContext } from '../context';
import { createTweetRouter } from './tweet-routes';
import { createAnalyticsRouter } from './analytics-routes';
import { sendError } from './http';

export interface GatewayServer {
  readonly app: express.Express;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Bound address once started (port 0 resolves to the real port) */
  address(): AddressInfo | null;
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createServer(config: Config['gateway'], ctx: AppContext): GatewayServer {
  const app = express();
  let httpServer: Server | null = null;

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    try {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        records: ctx.store.count(),
        providers: {
          huggingface: ctx.providers.some((p) => p.method === 'HuggingFace') && !!ctx.config.huggingface.apiKey,
        },
      });
    } catch (err) {
      sendError(res, err, 'Health check');
    }
  });

  app.use(createTweetRouter({ store: ctx.store, resolver: ctx.resolver }));
  app.use('/api', createAnalyticsRouter({ analytics: ctx.analytics }));

  // Body parser failures (malformed JSON, oversized body) and anything unhandled
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status >= 500) {
      logger.error({ err }, '[gateway] Unhandled request error');
      res.status(status).json({ error: 'Internal server error' });
      return;
    }
    res.status(status).json({ error: 'Invalid request body' });
  });

  return {
    app,

    async start() {
      return new Promise<void>((resolve, reject) => {
        const server = createHttpServer(app);
        httpServer = server;
        server.once('error', reject);
        server.listen(config.port, config.host, () => {
          server.off('error', reject);
          logger.info({ host: config.host, port: config.port }, '[gateway] HTTP server listening');
          resolve();
        });
      });
    },

    async stop() {
      return new Promise<void>((resolve, reject) => {
        const server = httpServer;
        if (!server) {
          resolve();
          return;
        }
        httpServer = null;
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },

    address() {
      const address = httpServer?.address();
      return address && typeof address === 'object' ? address : null;
    },
  };
}
