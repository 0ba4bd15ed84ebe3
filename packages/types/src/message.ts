import type { JsonObject, Timestamp } from "./foundational.js";

/**
 * Conversation roles. `"tool"` carries a tool result back to the model and
 * always answers a `toolCalls` entry of an earlier assistant message.
 */
export type MessageRole = "user" | "assistant" | "system" | "tool";

/** A tool invocation requested by the model. */
export interface ToolCall {
  /** Unique within one completion turn. */
  readonly id: string;
  readonly name: string;
  readonly arguments: JsonObject;
}

/** A single message in the conversation history. */
export interface ChatMessage {
  readonly role: MessageRole;
  /** May be empty when the message is a pure tool invocation. */
  readonly content: string;
  /** Only on assistant messages that request tools. */
  readonly toolCalls?: ReadonlyArray<ToolCall>;
  /** Only on tool messages: the `ToolCall.id` this result answers. */
  readonly toolCallId?: string;
  /** Tool name, echoed on tool messages for providers that want it. */
  readonly name?: string;
  readonly timestamp?: Timestamp;
}
