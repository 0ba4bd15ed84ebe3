import type { ChatMessage, Session, SessionId, SessionStore } from "@concierge/types";

/**
 * Write-through cache in front of another SessionStore.
 *
 * Entries only ever come from a successful read or write of the inner store,
 * and a failed write drops the entry, so the inner store stays the source of
 * truth. Only valid while this process is the single writer of the sessions
 * it caches.
 */
export class CachedSessionStore implements SessionStore {
  private readonly entries = new Map<SessionId, Session>();

  constructor(
    private readonly inner: SessionStore,
    private readonly maxEntries = 500
  ) {}

  async loadOrCreate(id: SessionId): Promise<Session> {
    const hit = this.lookup(id);
    if (hit) return hit;
    return this.remember(await this.inner.loadOrCreate(id));
  }

  async get(id: SessionId): Promise<Session | undefined> {
    const hit = this.lookup(id);
    if (hit) return hit;
    const session = await this.inner.get(id);
    return session ? this.remember(session) : undefined;
  }

  async append(id: SessionId, messages: ReadonlyArray<ChatMessage>): Promise<Session> {
    try {
      return this.remember(await this.inner.append(id, messages));
    } catch (err) {
      this.entries.delete(id);
      throw err;
    }
  }

  async delete(id: SessionId): Promise<void> {
    this.entries.delete(id);
    await this.inner.delete(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Map iteration order doubles as recency: re-inserting moves an entry to the end. */
  private lookup(id: SessionId): Session | undefined {
    const session = this.entries.get(id);
    if (session) {
      this.entries.delete(id);
      this.entries.set(id, session);
    }
    return session;
  }

  private remember(session: Session): Session {
    this.entries.delete(session.id);
    this.entries.set(session.id, session);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return session;
  }
}
