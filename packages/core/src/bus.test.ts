import { describe, it, expect, vi } from "vitest";
import { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";

describe("InMemoryEventBus", () => {
  it("delivers matching events and propagates trace context", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    const sub = bus.subscribe({ topics: ["agent.complete"] }, handler);

    const traceCtx = createTraceContext();
    const event = createEvent("agent.complete", { message: "done" }, traceCtx);
    await bus.publish(event);
    await bus.publish(createEvent("agent.turn", { message: "hi" }, traceCtx));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(event);
    expect(handler.mock.calls[0][0].traceCtx.traceId).toBe(traceCtx.traceId);

    sub.unsubscribe();
    await bus.publish(event);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("isolates a failing handler from the publisher and other subscribers", async () => {
    const bus = new InMemoryEventBus();
    const healthy = vi.fn();
    bus.subscribe({}, () => {
      throw new Error("boom");
    });
    bus.subscribe({}, healthy);

    await expect(
      bus.publish(createEvent("tool.request", {}, createTraceContext()))
    ).resolves.toBeUndefined();
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it("applies custom predicates", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    bus.subscribe(
      {
        predicate: (e) =>
          typeof e.payload === "object" &&
          e.payload !== null &&
          "tool" in e.payload &&
          e.payload.tool === "search_businesses",
      },
      handler
    );
    const trace = createTraceContext();

    await bus.publish(createEvent("tool.request", { tool: "list_services" }, trace));
    await bus.publish(createEvent("tool.request", { tool: "search_businesses" }, trace));

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("creates child spans within the same trace", () => {
    const root = createTraceContext();
    const child = createTraceContext(root);

    expect(child.traceId).toBe(root.traceId);
    expect(child.parentSpanId).toBe(root.spanId);
    expect(child.spanId).not.toBe(root.spanId);
  });
});
