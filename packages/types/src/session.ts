import type { SessionId, Timestamp } from "./foundational.js";
import type { ChatMessage } from "./message.js";

/**
 * The durable, ordered message history of one conversation.
 * Insertion order is conversational order.
 */
export interface Session {
  readonly id: SessionId;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
  readonly history: ReadonlyArray<ChatMessage>;
}

export interface SessionStore {
  /** Returns the stored session, creating an empty one tied to `id` if none exists. */
  loadOrCreate(id: SessionId): Promise<Session>;
  get(id: SessionId): Promise<Session | undefined>;
  /**
   * Appends every message of one turn, or none of them.
   * Resolves with the session as stored after the append.
   */
  append(id: SessionId, messages: ReadonlyArray<ChatMessage>): Promise<Session>;
  delete(id: SessionId): Promise<void>;
}
