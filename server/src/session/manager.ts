// ============================================================
// Vibe Studio - Session Manager
// Maps bearer tokens to explicit session contexts
// ============================================================

import { randomUUID } from 'node:crypto';
import type { SessionContext, UserIdentity } from '@shared/types';

export interface StoredSession {
  token: string;
  context: SessionContext;
  createdAt: number;
}

const UNAUTHENTICATED: SessionContext = { mode: 'unauthenticated', identity: null };

/**
 * Token → session store. Anything without a live token is
 * `unauthenticated`.
 */
export class SessionManager {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  createGuest(): StoredSession {
    return this.store({ mode: 'guest', identity: null });
  }

  createAuthenticated(identity: UserIdentity): StoredSession {
    return this.store({ mode: 'authenticated', identity });
  }

  /** Resolves a token; unknown, missing or expired tokens are unauthenticated. */
  resolve(token: string | null | undefined): SessionContext {
    if (!token) return UNAUTHENTICATED;

    const session = this.sessions.get(token);
    if (!session) return UNAUTHENTICATED;

    if (this.isExpired(session)) {
      this.sessions.delete(token);
      return UNAUTHENTICATED;
    }
    return session.context;
  }

  destroy(token: string): boolean {
    return this.sessions.delete(token);
  }

  /** Drops expired sessions, returns how many were removed. */
  sweep(): number {
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Sweeps on an interval that does not keep the process alive.
   * Returns a function that stops it.
   */
  startSweeper(intervalMs: number = 5 * 60 * 1000): () => void {
    const timer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        console.log(`[session] Swept ${removed} expired session(s)`);
      }
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private store(context: SessionContext): StoredSession {
    const session: StoredSession = { token: randomUUID(), context, createdAt: this.now() };
    this.sessions.set(session.token, session);
    return session;
  }

  private isExpired(session: StoredSession): boolean {
    return this.now() - session.createdAt > this.ttlMs;
  }
}

/** Reads `Authorization: Bearer <token>`. */
export function readBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = header.match(/^Bearer\s+(\S+)$/i);
  return match ? match[1] : null;
}
