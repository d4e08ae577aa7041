import { ConversationId, Session, newSession } from "../domain/session";
import { KeyedLock } from "../lib/keyedLock";
import { logger } from "../lib/logger";

const log = logger.child("sessions");

const STORE_LOCK = "sessions";

export interface SessionStoreOptions {
  timeoutMs: number;
  /** Epoch milliseconds; injected by tests */
  now?: () => number;
}

/**
 * SessionStore keeps per-conversation dialogue state in memory.
 *
 * Sessions idle longer than the timeout are dropped, lazily on the next
 * get() and in bulk by sweepExpired(). Nothing survives a restart.
 */
export class SessionStore {
  private readonly sessions = new Map<ConversationId, Session>();
  private readonly lock = new KeyedLock<string>();
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get the session for a conversation, or a fresh IDLE one if there is
   * none or it has expired. Reading extends the session's lease.
   */
  get(conversationId: ConversationId): Promise<Session> {
    return this.lock.run(STORE_LOCK, async () => {
      const now = this.now();
      const existing = this.sessions.get(conversationId);

      if (existing && now - existing.lastAccess < this.timeoutMs) {
        const refreshed = { ...existing, lastAccess: now };
        this.sessions.set(conversationId, refreshed);
        return refreshed;
      }

      if (existing) {
        log.debug("Session expired", { conversationId });
      }
      const fresh = newSession(now);
      this.sessions.set(conversationId, fresh);
      return fresh;
    });
  }

  save(conversationId: ConversationId, session: Session): Promise<void> {
    return this.lock.run(STORE_LOCK, async () => {
      this.sessions.set(conversationId, { ...session, lastAccess: this.now() });
    });
  }

  /**
   * Remove a conversation's session entirely
   */
  clear(conversationId: ConversationId): Promise<void> {
    return this.lock.run(STORE_LOCK, async () => {
      this.sessions.delete(conversationId);
    });
  }

  /** Remove every expired session and return how many were removed. */
  sweepExpired(): Promise<number> {
    return this.lock.run(STORE_LOCK, async () => {
      const cutoff = this.now() - this.timeoutMs;
      let removed = 0;
      for (const [conversationId, session] of this.sessions) {
        if (session.lastAccess <= cutoff) {
          this.sessions.delete(conversationId);
          removed++;
        }
      }
      if (removed > 0) {
        log.info("Expired sessions removed", { removed, remaining: this.sessions.size });
      }
      return removed;
    });
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Run sweepExpired() on an interval. The timer does not keep the
   * process alive; call the returned function to stop it.
   */
  startSweeper(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.sweepExpired().catch((error: unknown) => {
        log.error("Session sweep failed", error);
      });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}
