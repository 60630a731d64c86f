import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError } from '@core/errors/base-error.js';
import { FlowValidationError } from '@core/errors/validation.error.js';
import { logger } from '@utils/logger.js';

interface ErrorPayload {
  message: string;
  traceId: string;
  code?: string;
  data?: unknown;
}

export const errorMiddleware = (err: Error, _req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();
  const status = err instanceof BaseError ? err.status : 500;

  const payload: ErrorPayload = { message: err.message, traceId };
  if (err instanceof BaseError) payload.code = err.code;
  if (err instanceof FlowValidationError) payload.data = { issues: err.issues };

  if (status >= 500) {
    logger.error('[http] request failed', { traceId, err });
  }
  res.status(status).json(payload);
};
