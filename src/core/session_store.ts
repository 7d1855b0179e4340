import { randomUUID } from 'node:crypto';
import type { SessionConfig } from '../config/session.js';
import { ConversationMemory } from './memory.js';
import type { Router, RouterResponse } from './router.js';

export type RouterFactory = (memory: ConversationMemory) => Router;

interface Entry {
  router: Router;
  busy: boolean;
  expiresAt: number;
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string) {
    super(`session ${sessionId} is handling another turn`);
    this.name = 'SessionBusyError';
  }
}

/**
 * One router and one memory per session id. Idle sessions expire after the
 * TTL (swept lazily on access); past `maxSessions` the least recently used
 * session is dropped.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Entry>();
  private readonly ttlMs: number;

  constructor(
    private readonly factory: RouterFactory,
    private readonly cfg: SessionConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.ttlMs = cfg.ttlSec * 1000;
  }

  get size(): number {
    this.sweep();
    return this.sessions.size;
  }

  has(id: string): boolean {
    this.sweep();
    return this.sessions.has(id);
  }

  async runTurn(id: string | undefined, utterance: string): Promise<{ sessionId: string; response: RouterResponse }> {
    const sessionId = id ?? randomUUID();
    const entry = this.acquire(sessionId);
    if (entry.busy) throw new SessionBusyError(sessionId);

    entry.busy = true;
    try {
      const response = await entry.router.handle(utterance);
      return { sessionId, response };
    } finally {
      entry.busy = false;
      entry.expiresAt = this.now() + this.ttlMs;
    }
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  private acquire(id: string): Entry {
    this.sweep();
    const existing = this.sessions.get(id);
    if (existing) {
      // Re-insert to keep Map order as recency order.
      this.sessions.delete(id);
      this.sessions.set(id, existing);
      return existing;
    }

    while (this.sessions.size >= this.cfg.maxSessions) {
      const oldest = [...this.sessions.entries()].find(([, e]) => !e.busy);
      if (!oldest) break;
      this.sessions.delete(oldest[0]);
    }

    const entry: Entry = {
      router: this.factory(new ConversationMemory(this.now)),
      busy: false,
      expiresAt: this.now() + this.ttlMs,
    };
    this.sessions.set(id, entry);
    return entry;
  }

  private sweep(): void {
    const now = this.now();
    for (const [id, entry] of this.sessions) {
      if (!entry.busy && entry.expiresAt <= now) this.sessions.delete(id);
    }
  }
}
