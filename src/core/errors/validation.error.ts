import { BaseError } from './base-error.js';

export class ValidationError extends BaseError {
  constructor(message = 'Validation failed') {
    super('VALIDATION_ERROR', 422, message);
  }
}

/** Raised when a tenant's flow definition is rejected at load time. */
export class FlowValidationError extends ValidationError {
  constructor(
    public readonly tenant: string,
    public readonly issues: string[],
  ) {
    super(`invalid flow for tenant=${tenant}:\n- ${issues.join('\n- ')}`);
    this.code = 'FLOW_VALIDATION_ERROR';
  }
}
