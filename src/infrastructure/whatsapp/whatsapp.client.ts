import axios, { type AxiosInstance } from 'axios';

import { config } from '@config/env.config.js';
import { ConfigurationError, ExternalServiceError } from '@core/errors/index.js';
import { logger } from '@utils/logger.js';

const instances = new Map<string, AxiosInstance>();

function createInstance(phoneNumberId: string): AxiosInstance {
  const { WHATSAPP_ACCESS_TOKEN, WHATSAPP_API_VERSION } = config;
  if (!WHATSAPP_ACCESS_TOKEN) {
    throw new ConfigurationError('WHATSAPP_ACCESS_TOKEN is not configured');
  }
  return axios.create({
    baseURL: `https://graph.facebook.com/${WHATSAPP_API_VERSION}/${phoneNumberId}`,
    headers: {
      Authorization: `Bearer ${WHATSAPP_ACCESS_TOKEN}`,
      'Content-Type': 'application/json',
    },
    timeout: 10000,
    validateStatus: () => true,
  });
}

/** One axios instance per sending phone number. */
export function getWhatsAppAxios(phoneNumberId: string): AxiosInstance {
  let instance = instances.get(phoneNumberId);
  if (!instance) {
    instance = createInstance(phoneNumberId);
    instances.set(phoneNumberId, instance);
  }
  return instance;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

/** Posts to `/messages`; any non-2xx answer becomes an ExternalServiceError carrying the body. */
export async function sendWhatsAppMessage(http: AxiosInstance, payload: object): Promise<void> {
  const res = await http.post<unknown>('/messages', payload);
  if (res.status < 200 || res.status >= 300) {
    throw new ExternalServiceError('whatsapp', res.status, bodyText(res.data));
  }
  logger.debug('[whatsapp] message accepted', { response: bodyText(res.data) });
}
