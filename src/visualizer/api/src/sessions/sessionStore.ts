/**
 * Session store
 *
 * One execution controller per session id. Sessions idle longer than the
 * TTL are dropped on the next access, and the least recently used session
 * is evicted when the store is full.
 */

import { ExecutionController } from '../../../../simulator/src/index.js';

export interface SessionStoreOptions {
  ttlMs: number;
  maxSessions: number;
  now?: () => number;
}

interface Session {
  controller: ExecutionController;
  lastUsed: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSessions = options.maxSessions;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Fresh controller for the session, replacing any existing one
   */
  create(sessionId: string): ExecutionController {
    this.expire();
    this.sessions.delete(sessionId);

    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      console.log(`🗑️  Evicting session ${oldest.value}`);
      this.sessions.delete(oldest.value);
    }

    const controller = new ExecutionController();
    this.sessions.set(sessionId, { controller, lastUsed: this.now() });
    console.log(`🆕 Session created: ${sessionId}`);
    return controller;
  }

  /**
   * Controller for the session, or null if none is loaded
   */
  get(sessionId: string): ExecutionController | null {
    this.expire();
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    // Re-insert so iteration order stays least-recently-used first
    this.sessions.delete(sessionId);
    session.lastUsed = this.now();
    this.sessions.set(sessionId, session);
    return session.controller;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private expire(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, session] of this.sessions) {
      if (session.lastUsed <= cutoff) {
        console.log(`⌛ Session expired: ${id}`);
        this.sessions.delete(id);
      }
    }
  }
}
