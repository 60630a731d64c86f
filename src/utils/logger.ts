import winston from 'winston';

import { config, isProduction } from '@config/env.config.js';

export const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  silent: config.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction()
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple()),
  ),
  defaultMeta: { service: 'flow-orchestrator' },
  transports: [new winston.transports.Console()],
});
