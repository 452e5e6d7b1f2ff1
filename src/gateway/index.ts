/**
 * Gateway - owns the application context and the HTTP server lifecycle
 */

import { logger } from '../utils/logger';
import type { Config } from '../types';
import { createAppContext, type AppContext, type AppContextOptions } from '../context';
import { createServer, type GatewayServer } from './server';

export interface Gateway {
  readonly context: AppContext;
  readonly server: GatewayServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export async function createGateway(config: Config, options: AppContextOptions = {}): Promise<Gateway> {
  const context = await createAppContext(config, options);
  const server = createServer(config.gateway, context);

  async function start(): Promise<void> {
    await server.start();
  }

  async function stop(): Promise<void> {
    try {
      await server.stop();
    } finally {
      context.close();
      logger.info('[gateway] Stopped');
    }
  }

  return { context, server, start, stop };
}

export { createServer, type GatewayServer } from './server';
