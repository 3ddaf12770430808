/**
 * Image prewarmer server - entry point
 */

import { loadConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { createServer } from './server';

async function main(): Promise<void> {
  const config = loadConfig();
  const { start, stop } = createServer(config);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Received %s, shutting down', signal);
    stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed: %s', errorMessage(error));
        process.exit(1);
      },
    );
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  logger.info('Starting image prewarmer...');
  await start();
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start: %s', errorMessage(error));
  process.exit(1);
});
