export type {
  SessionId,
  TraceId,
  SpanId,
  EventId,
  RecordId,
  Timestamp,
  JsonValue,
  JsonObject,
} from "./foundational.js";
export type { TraceContext } from "./observability.js";
export type { MessageRole, ToolCall, ChatMessage } from "./message.js";
export type {
  ToolDescriptor,
  ToolRegistryClient,
  ToolCallRequest,
  ToolCallResult,
} from "./tool.js";
export type { Session, SessionStore } from "./session.js";
export type {
  EmbeddingRecord,
  SimilarityMatch,
  SimilarityStore,
  EmbeddingAdapter,
} from "./retrieval.js";
export type { ErrorCode, ConciergeErrorOptions } from "./error.js";
export { ConciergeError, isConciergeError, toConciergeError } from "./error.js";
export type {
  ConciergeEvent,
  EventTopic,
  EventFilter,
  EventHandler,
  Subscription,
  EventBus,
} from "./event-bus.js";
export type {
  TurnStatus,
  TurnResult,
  ConversationHandler,
  ChatReply,
  Gateway,
} from "./gateway.js";
