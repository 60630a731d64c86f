import { BaseError } from './base-error.js';

export class ConfigurationError extends BaseError {
  constructor(message = 'Configuration missing or invalid') {
    super('CONFIGURATION_ERROR', 500, message);
  }
}
