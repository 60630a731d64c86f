import { Router } from 'express';

import type { InboundHandler, WebhookOptions } from '../controllers/webhook.controller.js';

import healthRoutes from './health.routes.js';
import { createWebhookRoutes } from './webhook.routes.js';
import { createDevAvailabilityRoutes, type DevAvailabilityDeps } from './dev.availability.routes.js';

export interface ApiDeps extends DevAvailabilityDeps {
  conversation: InboundHandler;
  webhook: WebhookOptions;
  devRoutes: boolean;
}

export function createApiRouter(deps: ApiDeps): Router {
  const v1Router = Router();
  v1Router.use(healthRoutes);
  v1Router.use('/webhook', createWebhookRoutes(deps.conversation, deps.webhook));
  if (deps.devRoutes) {
    v1Router.use(createDevAvailabilityRoutes(deps));
  }

  const router = Router();
  router.use('/v1', v1Router);
  return router;
}
