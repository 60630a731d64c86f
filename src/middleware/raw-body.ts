import type { RequestHandler } from 'express';
import { raw } from 'express';

export const rawBody: RequestHandler = raw({ type: '*/*', limit: '1mb' });
