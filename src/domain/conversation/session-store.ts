import { initialState } from "./machine.js";
import type { Session } from "./types.js";

export type Clock = () => number;

export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

export interface SessionStoreOptions {
  idleTimeoutMs?: number;
  clock?: Clock;
}

export function isExpired(session: Session, now: number): boolean {
  return now > session.lastActivity + session.idleTimeoutMs;
}

/** In-memory registry of live conversations; expired entries read as absent. */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly idleTimeoutMs: number;
  private readonly clock: Clock;

  constructor(options: SessionStoreOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  now(): number {
    return this.clock();
  }

  create(conversationId: string, ownerId: string): Session {
    const now = this.clock();
    const session: Session = {
      conversationId,
      ownerId,
      createdAt: now,
      lastActivity: now,
      idleTimeoutMs: this.idleTimeoutMs,
      state: initialState
    };

    this.sessions.set(conversationId, session);
    return session;
  }

  get(conversationId: string): Session | null {
    const session = this.sessions.get(conversationId);
    if (!session) {
      return null;
    }

    if (isExpired(session, this.clock())) {
      this.sessions.delete(conversationId);
      return null;
    }

    return session;
  }

  touch(session: Session): void {
    session.lastActivity = this.clock();
  }

  remove(conversationId: string): boolean {
    return this.sessions.delete(conversationId);
  }

  /**
   * Drops every expired session. Ids for which `isBusy` returns true are left for
   * a later pass.
   */
  sweepExpired(isBusy: (conversationId: string) => boolean = () => false): string[] {
    const now = this.clock();
    const removed: string[] = [];

    for (const [conversationId, session] of this.sessions) {
      if (isExpired(session, now) && !isBusy(conversationId)) {
        this.sessions.delete(conversationId);
        removed.push(conversationId);
      }
    }

    return removed;
  }
}
