import type { AxiosInstance } from 'axios';

import { config, isProduction } from '@config/env.config.js';
import type { ListSection } from '@core/interfaces/flow.types.js';
import type { MessagingChannel } from '@core/interfaces/messaging.types.js';
import { getWhatsAppAxios, sendWhatsAppMessage } from '@infra/whatsapp/whatsapp.client.js';
import type {
  InteractiveListPayload,
  ListSectionPayload,
  OutboundPayload,
  TextPayload,
} from '@infra/whatsapp/whatsapp.types.js';
import { logger } from '@utils/logger.js';

export interface RecipientOptions {
  production: boolean;
  forceTo?: string;
}

/**
 * Outside production the Cloud API test numbers expect Argentine mobiles
 * without the leading 9 and without '+'.
 */
export function normalizeRecipient(to: string, production: boolean): string {
  if (production) return to;
  const digits = to.trim().replace(/^\+/, '');
  if (digits.startsWith('549') && digits.length > 3) {
    return `54${digits.slice(3)}`;
  }
  return digits;
}

export function toSectionPayloads(sections: ListSection[]): ListSectionPayload[] {
  return sections.map((section) => ({
    title: section.title,
    rows: section.rows.map((row) =>
      row.description.trim() !== ''
        ? { id: row.id, title: row.title, description: row.description }
        : { id: row.id, title: row.title },
    ),
  }));
}

export class WhatsAppService implements MessagingChannel {
  constructor(
    private readonly http: AxiosInstance,
    private readonly recipients: RecipientOptions = {
      production: isProduction(),
      forceTo: config.NODE_ENV === 'development' ? config.WHATSAPP_FORCE_TO : undefined,
    },
  ) {}

  static forPhoneNumber(phoneNumberId: string): WhatsAppService {
    return new WhatsAppService(getWhatsAppAxios(phoneNumberId));
  }

  async sendText(to: string, body: string): Promise<void> {
    const payload: TextPayload = {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: this.recipient(to),
      type: 'text',
      text: { body, preview_url: false },
    };
    await this.post(payload);
  }

  async sendInteractiveList(
    to: string,
    header: string,
    body: string,
    footer: string,
    buttonText: string,
    sections: ListSection[],
  ): Promise<void> {
    const interactive: InteractiveListPayload['interactive'] = {
      type: 'list',
      body: { text: body },
      action: { button: buttonText, sections: toSectionPayloads(sections) },
    };
    if (header.trim() !== '') interactive.header = { type: 'text', text: header };
    if (footer.trim() !== '') interactive.footer = { text: footer };

    await this.post({
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: this.recipient(to),
      type: 'interactive',
      interactive,
    });
  }

  private recipient(to: string): string {
    const { forceTo, production } = this.recipients;
    if (forceTo) {
      logger.warn('[whatsapp] WHATSAPP_FORCE_TO active', { original: to, forced: forceTo });
      return normalizeRecipient(forceTo, production);
    }
    return normalizeRecipient(to, production);
  }

  private async post(payload: OutboundPayload): Promise<void> {
    try {
      await sendWhatsAppMessage(this.http, payload);
    } catch (err) {
      logger.error('[whatsapp] send error', { type: payload.type, err });
      throw err;
    }
  }
}
