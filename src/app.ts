import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config, isProduction } from '@config/env.config.js';

import { createApiRouter } from './api/index.js';
import { buildContainer, type Container } from './container.js';
import { errorMiddleware } from './middleware/index.js';

export function createApp(container: Container = buildContainer()): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use(
    '/',
    createApiRouter({
      conversation: container.conversation,
      availability: container.availability,
      calendars: container.calendars,
      webhook: {
        verifyToken: config.WHATSAPP_VERIFY_TOKEN,
        appSecret: config.WHATSAPP_APP_SECRET,
      },
      devRoutes: !isProduction(),
    }),
  );
  app.use(errorMiddleware);

  return app;
}
