import { z } from 'zod';

import type { InboundEvent, InboundMessage } from '@core/interfaces/messaging.types.js';

const MessageSchema = z.object({
  from: z.string(),
  id: z.string().default(''),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string().default('') }).optional(),
  interactive: z
    .object({
      type: z.string(),
      button_reply: z.object({ id: z.string(), title: z.string().default('') }).optional(),
      list_reply: z
        .object({
          id: z.string(),
          title: z.string().default(''),
          description: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

const ContactSchema = z.object({
  wa_id: z.string().optional(),
  profile: z.object({ name: z.string().default('') }).default({}),
});

const ChangeSchema = z.object({
  field: z.string().optional(),
  value: z
    .object({
      metadata: z
        .object({
          phone_number_id: z.string().default(''),
          display_phone_number: z.string().optional(),
        })
        .default({}),
      contacts: z.array(ContactSchema).default([]),
      messages: z.array(MessageSchema).default([]),
    })
    .default({}),
});

export const WebhookPayloadSchema = z.object({
  object: z.string().optional(),
  entry: z.array(z.object({ changes: z.array(ChangeSchema).default([]) })).default([]),
});

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;
type WebhookMessage = z.infer<typeof MessageSchema>;

export function toInboundMessage(msg: WebhookMessage): InboundMessage {
  const base = { id: msg.id, from: msg.from };

  if (msg.type === 'text' && msg.text) {
    return { ...base, kind: 'text', body: msg.text.body };
  }

  if (msg.type === 'interactive' && msg.interactive) {
    const { interactive } = msg;
    if (interactive.type === 'list_reply' && interactive.list_reply) {
      return {
        ...base,
        kind: 'selection',
        source: 'list',
        selectionId: interactive.list_reply.id,
        title: interactive.list_reply.title,
      };
    }
    if (interactive.type === 'button_reply' && interactive.button_reply) {
      return {
        ...base,
        kind: 'selection',
        source: 'button',
        selectionId: interactive.button_reply.id,
        title: interactive.button_reply.title,
      };
    }
    return { ...base, kind: 'unsupported', type: `interactive:${interactive.type}` };
  }

  return { ...base, kind: 'unsupported', type: msg.type };
}

/** Flattens a webhook delivery into one event per message, in delivery order. */
export function extractInboundEvents(payload: WebhookPayload): InboundEvent[] {
  const events: InboundEvent[] = [];
  for (const entry of payload.entry) {
    for (const change of entry.changes) {
      const { metadata, contacts, messages } = change.value;
      for (const msg of messages) {
        const contact = contacts.find((c) => c.wa_id === msg.from) ?? contacts[0];
        const name = contact?.profile.name.trim();
        events.push({
          channelAccountId: metadata.phone_number_id,
          contactName: name || undefined,
          message: toInboundMessage(msg),
        });
      }
    }
  }
  return events;
}
