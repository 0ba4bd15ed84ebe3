import type { SessionId } from "./foundational.js";
import type { ErrorCode } from "./error.js";

/**
 * How a turn ended.
 * - `completed`: the model produced a final answer.
 * - `round_limit`: the model kept requesting tools past the round bound.
 * - `degraded`: a provider, tool server or protocol failure; `response` is an apology.
 */
export type TurnStatus = "completed" | "round_limit" | "degraded";

export interface TurnResult {
  readonly response: string;
  readonly sessionId: SessionId;
  readonly status: TurnStatus;
  /** Set when `status` is `degraded`. */
  readonly error?: ErrorCode;
  /** Tool rounds executed during the turn. */
  readonly rounds: number;
}

/** Anything that turns one user message into one reply. */
export interface ConversationHandler {
  processMessage(message: string, sessionId: SessionId): Promise<TurnResult>;
}

/** What the chat surface sends back to the client. */
export interface ChatReply {
  readonly response: string;
  readonly sessionId: SessionId;
  /** HTTP status hint for the transport layer. */
  readonly status: 200 | 500;
}

/**
 * The Gateway is the entry point for all external requests.
 */
export interface Gateway {
  /** Submit a user message and get the final response. A missing `sessionId` starts a new conversation. */
  handleMessage(message: string, sessionId?: string): Promise<ChatReply>;
}
