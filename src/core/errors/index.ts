export * from './base-error.js';
export * from './validation.error.js';
export * from './not-found.error.js';
export * from './configuration.error.js';
export * from './parse.error.js';
export * from './conflict.error.js';
export * from './external-service.error.js';
