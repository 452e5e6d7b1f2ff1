/**
 * Tweet Sentiment Analytics
 *
 * Entry point - loads config, opens storage and starts the HTTP gateway
 */

import { createGateway, type Gateway } from './gateway/index';
import { loadConfig } from './utils/config';
import { logger } from './utils/logger';
import type { Config } from './types';

// =============================================================================
// VALIDATION
// =============================================================================

function validateStartupRequirements(config: Config): void {
  const warnings: string[] = [];

  // The missing Hugging Face key is reported when the provider chain is built
  if (!config.storage.path) {
    warnings.push(
      'No DATABASE_PATH configured. Records are kept in memory and lost on exit.\n' +
        '  Fix: Add DATABASE_PATH=./data/tweets.db to your .env file',
    );
  }

  for (const warning of warnings) {
    logger.warn(warning);
  }
}

// =============================================================================
// MAIN
// =============================================================================

export async function runService(configPath?: string): Promise<Gateway> {
  const config = await loadConfig(configPath);
  validateStartupRequirements(config);
  logger.info({ port: config.gateway.port }, 'Config loaded');

  const gateway = await createGateway(config);
  await gateway.start();
  logger.info(`Sentiment analytics is running on http://${config.gateway.host}:${config.gateway.port}`);

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    try {
      await gateway.stop();
    } catch (e) {
      logger.error({ err: e }, 'Error during shutdown');
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  return gateway;
}

async function main() {
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });

  await runService();
}

if (require.main === module) {
  main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
  });
}
