import { config } from '@config/env.config.js';
import { startSessionSweeper, stopSessionSweeper } from '@services/conversation/index.js';
import { logger } from '@utils/logger.js';

import { createApp } from './app.js';
import { buildContainer } from './container.js';

function bootstrap(): void {
  const container = buildContainer();
  startSessionSweeper(container.sessions, config.SESSION_SWEEP_INTERVAL_SECONDS * 1000);

  const server = createApp(container).listen(config.PORT, () => {
    logger.info(`webhook listening on ${config.PORT}`, { env: config.NODE_ENV });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`received ${signal}, closing...`);
    stopSessionSweeper();
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  bootstrap();
} catch (err) {
  logger.error('Fatal bootstrap error', { err });
  process.exit(1);
}
