import crypto from 'crypto';

import request from 'supertest';
import { describe, expect, it } from 'vitest';

import type { InboundEvent } from '@core/interfaces/messaging.types.js';
import { createWebhookRoutes } from '@api/routes/webhook.routes.js';
import type { InboundHandler, WebhookOptions } from '@api/controllers/webhook.controller.js';
import { buildTestApp } from '@test/utils/buildTestApp.js';

class RecordingHandler implements InboundHandler {
  readonly events: InboundEvent[] = [];

  async handleInbound(event: InboundEvent): Promise<void> {
    this.events.push(event);
  }
}

function makeApp(options: Partial<WebhookOptions> = {}) {
  const handler = new RecordingHandler();
  const app = buildTestApp(
    createWebhookRoutes(handler, { verifyToken: 'test-verify-token', ...options }),
    '/v1/webhook',
  );
  return { app, handler };
}

const delivery = {
  object: 'whatsapp_business_account',
  entry: [
    {
      changes: [
        {
          field: 'messages',
          value: {
            metadata: { phone_number_id: '1001' },
            contacts: [{ wa_id: '5491100000000', profile: { name: 'Ana' } }],
            messages: [
              { from: '5491100000000', id: 'wamid.1', type: 'text', text: { body: 'hola' } },
              {
                from: '5491100000000',
                id: 'wamid.2',
                type: 'interactive',
                interactive: { type: 'list_reply', list_reply: { id: 'BUY', title: 'Comprar' } },
              },
            ],
          },
        },
      ],
    },
  ],
};

const sign = (body: string, secret: string) =>
  'sha256=' + crypto.createHmac('sha256', secret).update(body).digest('hex');

describe('GET /v1/webhook', () => {
  it('echoes the challenge when the verify token matches', async () => {
    const { app } = makeApp();

    const res = await request(app)
      .get('/v1/webhook')
      .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify-token', 'hub.challenge': '12345' });

    expect(res.status).toBe(200);
    expect(res.text).toBe('12345');
  });

  it('rejects a wrong verify token', async () => {
    const { app } = makeApp();

    const res = await request(app)
      .get('/v1/webhook')
      .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'nope', 'hub.challenge': '12345' });

    expect(res.status).toBe(403);
  });
});

describe('POST /v1/webhook', () => {
  it('dispatches every message of the delivery in order', async () => {
    const { app, handler } = makeApp();

    const res = await request(app)
      .post('/v1/webhook')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify(delivery));

    expect(res.status).toBe(200);
    expect(handler.events).toEqual([
      {
        channelAccountId: '1001',
        contactName: 'Ana',
        message: { kind: 'text', id: 'wamid.1', from: '5491100000000', body: 'hola' },
      },
      {
        channelAccountId: '1001',
        contactName: 'Ana',
        message: {
          kind: 'selection',
          id: 'wamid.2',
          from: '5491100000000',
          source: 'list',
          selectionId: 'BUY',
          title: 'Comprar',
        },
      },
    ]);
  });

  it('acknowledges malformed JSON without dispatching', async () => {
    const { app, handler } = makeApp();

    const res = await request(app)
      .post('/v1/webhook')
      .set('Content-Type', 'application/json')
      .send('{"entry": [');

    expect(res.status).toBe(200);
    expect(handler.events).toEqual([]);
  });

  it('acknowledges status-only deliveries without dispatching', async () => {
    const { app, handler } = makeApp();
    const statuses = {
      entry: [{ changes: [{ value: { metadata: { phone_number_id: '1001' }, statuses: [{ id: 'x' }] } }] }],
    };

    const res = await request(app)
      .post('/v1/webhook')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify(statuses));

    expect(res.status).toBe(200);
    expect(handler.events).toEqual([]);
  });

  it('requires a valid signature when an app secret is configured', async () => {
    const { app, handler } = makeApp({ appSecret: 'test-secret' });
    const body = JSON.stringify(delivery);

    const unsigned = await request(app)
      .post('/v1/webhook')
      .set('Content-Type', 'application/json')
      .send(body);
    const forged = await request(app)
      .post('/v1/webhook')
      .set('Content-Type', 'application/json')
      .set('x-hub-signature-256', sign(body, 'other-secret'))
      .send(body);

    expect(unsigned.status).toBe(401);
    expect(forged.status).toBe(401);
    expect(handler.events).toEqual([]);

    const signed = await request(app)
      .post('/v1/webhook')
      .set('Content-Type', 'application/json')
      .set('x-hub-signature-256', sign(body, 'test-secret'))
      .send(body);

    expect(signed.status).toBe(200);
    expect(handler.events).toHaveLength(2);
  });
});
