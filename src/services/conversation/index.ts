export * from './conversation.service.js';
export * from './state-machine.js';
export * from './renderer.js';
export * from './session.store.js';
export * from './session.sweeper.js';
export * from './template.js';
export type { Session, Decision } from './state.types.js';
export { sessionKey } from './state.types.js';
