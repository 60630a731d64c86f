export * from './controllers/webhook.controller.js';
export * from './controllers/webhook.parser.js';
export { default as healthRoutes } from './routes/health.routes.js';
export { createWebhookRoutes } from './routes/webhook.routes.js';
export { createApiRouter } from './routes/index.js';
