import { describe, it, expect, vi } from "vitest";
import { ConciergeError, type ConversationHandler, type SessionId } from "@concierge/types";
import { ChatGateway } from "./gateway.js";
import { DEGRADED_REPLIES, INTERNAL_ERROR_REPLY } from "./replies.js";

function handlerReplying(response: string): ConversationHandler {
  return {
    processMessage: vi.fn(async (_message: string, sessionId: SessionId) => ({
      response,
      sessionId,
      status: "completed" as const,
      rounds: 0,
    })),
  };
}

describe("ChatGateway", () => {
  it("passes the client's session id through", async () => {
    const handler = handlerReplying("Hi there");
    const gateway = new ChatGateway({ handler });

    const reply = await gateway.handleMessage("hello", "session-1");

    expect(reply).toEqual({ response: "Hi there", sessionId: "session-1", status: 200 });
    expect(handler.processMessage).toHaveBeenCalledWith("hello", "session-1");
  });

  it("keeps surrounding whitespace in a supplied session id", async () => {
    const handler = handlerReplying("Hi there");
    const gateway = new ChatGateway({ handler });

    const reply = await gateway.handleMessage("hello", " abc ");

    expect(reply.sessionId).toBe(" abc ");
    expect(handler.processMessage).toHaveBeenCalledWith("hello", " abc ");
  });

  it("generates a UUID when no session id is supplied", async () => {
    const gateway = new ChatGateway({ handler: handlerReplying("ok") });

    const first = await gateway.handleMessage("hello");
    const second = await gateway.handleMessage("hello", "   ");

    expect(first.sessionId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
    expect(second.sessionId).not.toBe(first.sessionId);
  });

  it("maps storage failures to an apology with a 500 hint", async () => {
    const gateway = new ChatGateway({
      handler: {
        processMessage: async () => {
          throw new ConciergeError("STORAGE_FAILURE", "disk full");
        },
      },
    });

    const reply = await gateway.handleMessage("book me in", "s-9");

    expect(reply).toEqual({
      response: DEGRADED_REPLIES.STORAGE_FAILURE,
      sessionId: "s-9",
      status: 500,
    });
  });

  it("never leaks an unstructured crash", async () => {
    const gateway = new ChatGateway({
      handler: {
        processMessage: async () => {
          throw new TypeError("cannot read properties of undefined");
        },
      },
    });

    const reply = await gateway.handleMessage("hi", "s-1");

    expect(reply).toEqual({ response: INTERNAL_ERROR_REPLY, sessionId: "s-1", status: 500 });
  });
});
