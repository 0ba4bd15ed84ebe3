import { v7 as uuidv7 } from "uuid";
import type { Logger } from "pino";
import type {
  EventBus,
  ConciergeEvent,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SpanId,
  TraceId,
} from "@concierge/types";
import { makeNoopLogger } from "./logger.js";

/**
 * In-memory implementation of the event bus.
 *
 * Handlers run concurrently; `publish` resolves once every handler has
 * settled. A failing handler is logged and never affects the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<{
    filter: EventFilter;
    handler: EventHandler<unknown>;
    id: string;
  }>();

  constructor(private readonly log: Logger = makeNoopLogger()) {}

  async publish<T>(event: ConciergeEvent<T>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (!this.matches(event, sub.filter)) continue;
      promises.push(
        Promise.resolve()
          .then(() => sub.handler(event))
          .catch((err: unknown) => {
            this.log.error(
              { err, topic: event.topic, subscription: sub.id },
              "event handler failed"
            );
          })
      );
    }

    await Promise.all(promises);
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    // Handlers are registered per topic; the payload type is the subscriber's contract.
    const sub = { filter, handler: handler as EventHandler<unknown>, id };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  private matches(event: ConciergeEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext
): ConciergeEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
