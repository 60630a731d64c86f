import { Router } from 'express';

import { rawBody } from '@middleware/raw-body.js';

import {
  verifyHandler,
  webhookHandler,
  type InboundHandler,
  type WebhookOptions,
} from '../controllers/webhook.controller.js';

export function createWebhookRoutes(conversation: InboundHandler, options: WebhookOptions): Router {
  const router = Router();
  router.get('/', verifyHandler(options));
  router.post('/', rawBody, webhookHandler(conversation, options));
  return router;
}
