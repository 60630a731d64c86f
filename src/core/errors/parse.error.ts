import { BaseError } from './base-error.js';

export class ParseError extends BaseError {
  constructor(message = 'Malformed input') {
    super('PARSE_ERROR', 400, message);
  }
}
