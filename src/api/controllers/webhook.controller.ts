import type { Request, RequestHandler, Response } from 'express';

import type { InboundEvent } from '@core/interfaces/messaging.types.js';
import { logger } from '@utils/logger.js';

import { extractInboundEvents, WebhookPayloadSchema } from './webhook.parser.js';
import { verifySignature } from './webhook.validator.js';

export interface InboundHandler {
  handleInbound(event: InboundEvent): Promise<void>;
}

export interface WebhookOptions {
  verifyToken: string;
  appSecret?: string;
}

export const verifyHandler =
  (options: WebhookOptions): RequestHandler =>
  (req: Request, res: Response): void => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];
    if (mode === 'subscribe' && token === options.verifyToken) {
      res.status(200).send(typeof challenge === 'string' ? challenge : '');
    } else {
      res.sendStatus(403);
    }
  };

function parseBody(body: unknown): unknown {
  if (!Buffer.isBuffer(body)) return body;
  try {
    return JSON.parse(body.toString('utf8'));
  } catch {
    logger.warn('[webhook] body is not valid JSON, ignoring delivery');
    return undefined;
  }
}

export const webhookHandler =
  (conversation: InboundHandler, options: WebhookOptions): RequestHandler =>
  async (req, res, next) => {
    try {
      if (options.appSecret) {
        const raw = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        const signature = req.header('x-hub-signature-256');
        if (!verifySignature(raw, signature, options.appSecret)) {
          res.sendStatus(401);
          return;
        }
      }

      const parsed = WebhookPayloadSchema.safeParse(parseBody(req.body));
      if (!parsed.success) {
        logger.warn('[webhook] unexpected payload shape', { issues: parsed.error.issues });
        res.sendStatus(200);
        return;
      }

      for (const event of extractInboundEvents(parsed.data)) {
        await conversation.handleInbound(event);
      }
      res.sendStatus(200);
    } catch (err) {
      next(err);
    }
  };
