import type { EventId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Lifecycle events of a chat turn. The bus is an observation channel: turns
 * are driven by direct calls, subscribers only watch.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface ConciergeEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
}

/**
 * Enumerated event topics.
 */
export type EventTopic =
  // Lifecycle
  | "agent.turn"
  | "agent.complete"
  | "agent.error"
  // Tool calls
  | "tool.request"
  | "tool.result";

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: ConciergeEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: ConciergeEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: ConciergeEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;
}
