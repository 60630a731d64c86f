import { logger } from '@utils/logger.js';

import type { SessionStore } from './session.store.js';

let sweepInterval: NodeJS.Timeout | undefined;

export async function sweepSessions(store: SessionStore): Promise<number> {
  const evicted = await store.evictIdle();
  if (evicted > 0) {
    logger.info('[sessions] evicted idle sessions', { evicted, remaining: await store.size() });
  }
  return evicted;
}

export function startSessionSweeper(store: SessionStore, intervalMs: number): void {
  if (sweepInterval || intervalMs <= 0) return;
  sweepInterval = setInterval(() => {
    sweepSessions(store).catch((err) => {
      logger.error('[sessions] sweep failed', { err });
    });
  }, intervalMs);
  sweepInterval.unref();
}

export function stopSessionSweeper(): void {
  if (sweepInterval) {
    clearInterval(sweepInterval);
    sweepInterval = undefined;
  }
}
