import { RwLock } from '@utils/locks.js';

import type { Session } from './state.types.js';

export interface SessionStoreOptions {
  /** Sessions idle longer than this are treated as absent. 0 keeps them forever. */
  idleTtlMs?: number;
  now?: () => number;
}

export class SessionStore {
  private readonly lock = new RwLock();
  private readonly sessions = new Map<string, Session>();
  private readonly idleTtlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get(key: string): Promise<Session | null> {
    return this.lock.read(() => {
      const session = this.sessions.get(key);
      if (!session || this.isExpired(session)) return null;
      return session;
    });
  }

  set(key: string, session: Session): Promise<void> {
    return this.lock.write(() => {
      this.sessions.set(key, session);
    });
  }

  /** Removes expired sessions and returns how many were dropped. */
  evictIdle(): Promise<number> {
    return this.lock.write(() => {
      let evicted = 0;
      for (const [key, session] of this.sessions) {
        if (this.isExpired(session)) {
          this.sessions.delete(key);
          evicted += 1;
        }
      }
      return evicted;
    });
  }

  size(): Promise<number> {
    return this.lock.read(() => this.sessions.size);
  }

  private isExpired(session: Session): boolean {
    if (this.idleTtlMs <= 0) return false;
    return this.now() - session.updatedAt.getTime() > this.idleTtlMs;
  }
}
