import { BaseError } from './base-error.js';

export class ExternalServiceError extends BaseError {
  constructor(
    public readonly service: string,
    public readonly upstreamStatus: number,
    public readonly responseBody: string,
  ) {
    super('EXTERNAL_SERVICE_ERROR', 502, `${service} responded ${upstreamStatus}: ${responseBody}`);
  }
}
