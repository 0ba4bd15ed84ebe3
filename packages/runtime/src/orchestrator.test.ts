import { describe, it, expect, vi } from "vitest";
import {
  ConciergeError,
  type ChatMessage,
  type ConciergeEvent,
  type EmbeddingAdapter,
  type EmbeddingRecord,
  type JsonObject,
  type Session,
  type SessionId,
  type SessionStore,
  type SimilarityMatch,
  type SimilarityStore,
  type ToolDescriptor,
} from "@concierge/types";
import { DEGRADED_REPLIES, InMemoryEventBus, ROUND_LIMIT_REPLY } from "@concierge/core";
import { Orchestrator, toolErrorDocument, type OrchestratorOptions } from "./orchestrator.js";
import { ScriptedModelAdapter, callTools, providerDown, replyWith } from "./model-adapter.js";
import { RagRetriever } from "./rag-retriever.js";

const SESSION = "session-1" as SessionId;

class MemorySessionStore implements SessionStore {
  readonly sessions = new Map<SessionId, Session>();
  failAppend = false;

  async loadOrCreate(id: SessionId): Promise<Session> {
    const existing = this.sessions.get(id);
    if (existing) return existing;
    const created: Session = { id, createdAt: "t0", updatedAt: "t0", history: [] };
    this.sessions.set(id, created);
    return created;
  }

  async get(id: SessionId): Promise<Session | undefined> {
    return this.sessions.get(id);
  }

  async append(id: SessionId, messages: ReadonlyArray<ChatMessage>): Promise<Session> {
    if (this.failAppend) throw new ConciergeError("STORAGE_FAILURE", "disk full");
    const session = await this.loadOrCreate(id);
    const next: Session = { ...session, history: [...session.history, ...messages] };
    this.sessions.set(id, next);
    return next;
  }

  async delete(id: SessionId): Promise<void> {
    this.sessions.delete(id);
  }

  history(id: SessionId = SESSION): ReadonlyArray<ChatMessage> {
    return this.sessions.get(id)?.history ?? [];
  }
}

const CATALOG: ToolDescriptor[] = [
  { name: "search_businesses", description: "Find businesses", parameterSchema: { type: "object" } },
  { name: "book_appointment", description: "Book a slot", parameterSchema: { type: "object" } },
];

function fakeTools(
  impl: (name: string, args: JsonObject, signal?: AbortSignal) => Promise<string> = async (name) => `${name} ok`
) {
  return {
    listTools: vi.fn(async () => CATALOG),
    callTool: vi.fn(impl),
  };
}

function setup(model: ScriptedModelAdapter, overrides: Partial<OrchestratorOptions> = {}) {
  const sessions = new MemorySessionStore();
  const tools = fakeTools();
  const orchestrator = new Orchestrator({
    model,
    tools,
    sessions,
    systemPrompt: "",
    completionRetry: { retries: 2, baseDelayMs: 1 },
    sleep: async () => {},
    ...overrides,
  });
  return { orchestrator, sessions, tools };
}

const search = (id: string, args: JsonObject = {}) => ({ id, name: "search_businesses", arguments: args });

describe("Orchestrator", () => {
  it("answers directly and stores user and assistant messages", async () => {
    const { orchestrator, sessions } = setup(new ScriptedModelAdapter([replyWith("Hello!")]));

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result).toEqual({ response: "Hello!", sessionId: SESSION, status: "completed", rounds: 0 });
    expect(sessions.history().map((m) => [m.role, m.content])).toEqual([
      ["user", "hi"],
      ["assistant", "Hello!"],
    ]);
  });

  it("runs tools in model order and feeds results back", async () => {
    const model = new ScriptedModelAdapter([
      callTools(search("c1", { city: "Athens" }), { id: "c2", name: "book_appointment", arguments: {} }),
      replyWith("All set."),
    ]);
    const { orchestrator, sessions, tools } = setup(model);

    const result = await orchestrator.processMessage("book me", SESSION);

    expect(result.status).toBe("completed");
    expect(result.rounds).toBe(1);
    expect(tools.callTool.mock.calls.map(([name, args]) => [name, args])).toEqual([
      ["search_businesses", { city: "Athens" }],
      ["book_appointment", {}],
    ]);
    const secondPrompt = model.calls[1].messages;
    expect(secondPrompt.slice(-2)).toEqual([
      expect.objectContaining({ role: "tool", toolCallId: "c1", content: "search_businesses ok" }),
      expect.objectContaining({ role: "tool", toolCallId: "c2", content: "book_appointment ok" }),
    ]);
    expect(sessions.history().map((m) => m.role)).toEqual(["user", "assistant", "tool", "tool", "assistant"]);
  });

  it("reports a failed tool to the model and keeps going", async () => {
    const model = new ScriptedModelAdapter([callTools(search("c1")), replyWith("Nothing found.")]);
    const { orchestrator, sessions } = setup(model, {
      tools: fakeTools(async () => {
        throw new ConciergeError("TOOL_EXECUTION_FAILED", "no results", { details: { code: 404 } });
      }),
    });

    const result = await orchestrator.processMessage("find a spa", SESSION);

    expect(result.response).toBe("Nothing found.");
    expect(sessions.history()[2]).toMatchObject({
      role: "tool",
      toolCallId: "c1",
      content: '{"error":{"code":404,"kind":"TOOL_EXECUTION_FAILED","message":"no results"}}',
    });
  });

  it("degrades on an unknown tool without running anything", async () => {
    const model = new ScriptedModelAdapter([
      callTools(search("c1"), { id: "c2", name: "drop_database", arguments: {} }),
    ]);
    const { orchestrator, sessions, tools } = setup(model);

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result).toEqual({
      response: DEGRADED_REPLIES.PROTOCOL_VIOLATION,
      sessionId: SESSION,
      status: "degraded",
      error: "PROTOCOL_VIOLATION",
      rounds: 0,
    });
    expect(tools.callTool).not.toHaveBeenCalled();
    expect(sessions.history()).toEqual([]);
  });

  it("degrades on duplicate call ids in one completion", async () => {
    const { orchestrator, tools } = setup(new ScriptedModelAdapter([callTools(search("c1"), search("c1"))]));

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result.error).toBe("PROTOCOL_VIOLATION");
    expect(tools.callTool).not.toHaveBeenCalled();
  });

  it("degrades on an empty completion", async () => {
    const { orchestrator } = setup(new ScriptedModelAdapter([replyWith("   ")]));

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result.error).toBe("PROTOCOL_VIOLATION");
  });

  it("stops a model that never stops calling tools", async () => {
    const model = new ScriptedModelAdapter([callTools(search("c1"))]);
    const { orchestrator, sessions, tools } = setup(model, { maxToolRounds: 3 });

    const result = await orchestrator.processMessage("loop", SESSION);

    expect(result).toEqual({ response: ROUND_LIMIT_REPLY, sessionId: SESSION, status: "round_limit", rounds: 3 });
    expect(tools.callTool).toHaveBeenCalledTimes(3);
    expect(model.calls).toHaveLength(4);
    const roles = sessions.history().map((m) => m.role);
    expect(roles).toEqual(["user", "assistant", "tool", "assistant", "tool", "assistant", "tool", "assistant"]);
    expect(sessions.history()[7]).toMatchObject({ role: "assistant", content: ROUND_LIMIT_REPLY });
    expect(sessions.history()[7].toolCalls).toBeUndefined();
  });

  it("retries the provider, then succeeds", async () => {
    const model = new ScriptedModelAdapter([providerDown(), providerDown(), replyWith("Back online.")]);
    const { orchestrator } = setup(model);

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result.response).toBe("Back online.");
    expect(model.calls).toHaveLength(3);
  });

  it("degrades after exhausting provider retries and stores nothing", async () => {
    const model = new ScriptedModelAdapter([providerDown()]);
    const { orchestrator, sessions } = setup(model);

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result.status).toBe("degraded");
    expect(result.response).toBe(
      "The assistant is temporarily unavailable. Please try again in a moment."
    );
    expect(model.calls).toHaveLength(3);
    expect(sessions.history()).toEqual([]);
  });

  it("does not retry a provider error marked permanent", async () => {
    const model = new ScriptedModelAdapter([providerDown("bad key", false)]);
    const { orchestrator } = setup(model);

    await orchestrator.processMessage("hi", SESSION);

    expect(model.calls).toHaveLength(1);
  });

  it("degrades when tools cannot be listed", async () => {
    const model = new ScriptedModelAdapter([replyWith("unused")]);
    const { orchestrator } = setup(model, {
      tools: {
        listTools: async () => {
          throw new ConciergeError("TOOL_UNAVAILABLE", "connection refused");
        },
        callTool: async () => "",
      },
    });

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result.error).toBe("TOOL_UNAVAILABLE");
    expect(result.response).toBe("The booking tools are currently unavailable. Please try again shortly.");
    expect(model.calls).toHaveLength(0);
  });

  it("degrades when listing fails with an error from outside the taxonomy", async () => {
    const model = new ScriptedModelAdapter([replyWith("unused")]);
    const { orchestrator } = setup(model, {
      tools: {
        listTools: async () => {
          throw new TypeError("fetch failed");
        },
        callTool: async () => "",
      },
    });

    const result = await orchestrator.processMessage("hi", SESSION);

    expect(result).toMatchObject({ status: "degraded", error: "TOOL_UNAVAILABLE" });
    expect(model.calls).toHaveLength(0);
  });

  it("reports a tool that throws a plain error to the model", async () => {
    const model = new ScriptedModelAdapter([callTools(search("c1")), replyWith("Search is down, sorry.")]);
    const { orchestrator, sessions } = setup(model, {
      tools: fakeTools(async () => {
        throw new TypeError("fetch failed");
      }),
    });

    const result = await orchestrator.processMessage("find a spa", SESSION);

    expect(result).toMatchObject({ status: "completed", response: "Search is down, sorry." });
    expect(sessions.history()[2]).toMatchObject({
      role: "tool",
      toolCallId: "c1",
      content: '{"error":{"code":null,"kind":"TOOL_UNAVAILABLE","message":"fetch failed"}}',
    });
  });

  it("maps a failing session load to STORAGE_FAILURE", async () => {
    const sessions = new MemorySessionStore();
    sessions.loadOrCreate = async () => {
      throw new Error("database is locked");
    };
    const { orchestrator } = setup(new ScriptedModelAdapter([replyWith("unused")]), { sessions });

    const err = await orchestrator.processMessage("hi", SESSION).then(
      () => undefined,
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(ConciergeError);
    if (!(err instanceof ConciergeError)) return;
    expect(err.code).toBe("STORAGE_FAILURE");
    expect(err.message).toBe("database is locked");
    expect(err.details.pendingMessages).toEqual([expect.objectContaining({ role: "user", content: "hi" })]);
  });

  it("aborts the in-flight tool call when the turn runs out of time", async () => {
    const seen: Array<AbortSignal | undefined> = [];
    const model = new ScriptedModelAdapter([callTools(search("c1"))]);
    const { orchestrator, sessions } = setup(model, {
      turnTimeoutMs: 30,
      toolTimeoutMs: 5_000,
      tools: fakeTools(
        (_name, _args, signal) =>
          new Promise<string>((_, reject) => {
            seen.push(signal);
            if (signal) signal.addEventListener("abort", () => reject(signal.reason));
          })
      ),
    });

    const result = await orchestrator.processMessage("book it", SESSION);

    expect(result).toMatchObject({ status: "degraded", error: "TURN_TIMEOUT", rounds: 0 });
    expect(seen).toHaveLength(1);
    expect(seen[0]?.aborted).toBe(true);
    expect(seen[0]?.reason).toMatchObject({ code: "TURN_TIMEOUT" });
    expect(sessions.history().map((m) => m.role)).toEqual(["user"]);
  });

  it("stores the completed rounds of a timed-out turn", async () => {
    let calls = 0;
    const model = new ScriptedModelAdapter([callTools(search("c1")), callTools(search("c2"))]);
    const { orchestrator, sessions } = setup(model, {
      turnTimeoutMs: 50,
      toolTimeoutMs: 1_000,
      tools: fakeTools(async () => {
        calls++;
        if (calls === 1) return "first";
        return new Promise<string>(() => {});
      }),
    });

    const result = await orchestrator.processMessage("slow", SESSION);

    expect(result).toMatchObject({ status: "degraded", error: "TURN_TIMEOUT", rounds: 1 });
    expect(sessions.history().map((m) => [m.role, m.content])).toEqual([
      ["user", "slow"],
      ["assistant", ""],
      ["tool", "first"],
    ]);
  });

  it("throws storage failures with the unsaved messages", async () => {
    const { orchestrator, sessions } = setup(new ScriptedModelAdapter([replyWith("Saved?")]));
    sessions.failAppend = true;

    const err = await orchestrator.processMessage("hi", SESSION).then(
      () => undefined,
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(ConciergeError);
    if (!(err instanceof ConciergeError)) return;
    expect(err.code).toBe("STORAGE_FAILURE");
    expect(err.details.pendingMessages).toEqual([
      expect.objectContaining({ role: "user", content: "hi" }),
      expect.objectContaining({ role: "assistant", content: "Saved?" }),
    ]);
  });

  it("publishes the turn lifecycle on the bus", async () => {
    const bus = new InMemoryEventBus();
    const events: ConciergeEvent[] = [];
    bus.subscribe({}, (e) => {
      events.push(e);
    });
    const model = new ScriptedModelAdapter([callTools(search("c1")), replyWith("Done")]);
    const { orchestrator } = setup(model, { bus });

    await orchestrator.processMessage("hi", SESSION);

    expect(events.map((e) => e.topic)).toEqual(["agent.turn", "tool.request", "tool.result", "agent.complete"]);
    expect(new Set(events.map((e) => e.traceCtx.traceId)).size).toBe(1);
    expect(events[2].payload).toMatchObject({ callId: "c1", tool: "search_businesses", success: true });
  });

  describe("with retrieval", () => {
    class MemorySimilarityStore implements SimilarityStore {
      readonly dimensions = 2;
      readonly records: EmbeddingRecord[] = [];
      async insert(record: EmbeddingRecord): Promise<void> {
        this.records.push(record);
      }
      async queryNearest(): Promise<SimilarityMatch[]> {
        return this.records.map((record) => ({ record, score: 1 }));
      }
    }

    it("adds past context to the prompt and embeds the message once", async () => {
      const store = new MemorySimilarityStore();
      const embed = vi.fn(async () => [1, 0]);
      const embedder: EmbeddingAdapter = { dimensions: 2, embed };
      const retriever = new RagRetriever({ embedder, store });
      const model = new ScriptedModelAdapter([replyWith("first"), replyWith("second")]);
      const { orchestrator } = setup(model, { retriever });

      await orchestrator.processMessage("I like mornings", SESSION);
      await orchestrator.processMessage("when am I free?", SESSION);

      expect(embed).toHaveBeenCalledTimes(2);
      expect(store.records.map((r) => [r.text, r.ownerId])).toEqual([
        ["I like mornings", SESSION],
        ["when am I free?", SESSION],
      ]);
      expect(model.calls[0].messages[0].role).toBe("user");
      expect(model.calls[1].messages[0]).toEqual({
        role: "system",
        content: "Relevant context from past conversations:\n- I like mornings",
      });
    });

    it("carries on without context when embedding fails", async () => {
      const store = new MemorySimilarityStore();
      const embedder: EmbeddingAdapter = {
        dimensions: 2,
        embed: async () => {
          throw new ConciergeError("PROVIDER_UNAVAILABLE", "quota", { retryable: false });
        },
      };
      const retriever = new RagRetriever({ embedder, store });
      const { orchestrator } = setup(new ScriptedModelAdapter([replyWith("fine")]), { retriever });

      const result = await orchestrator.processMessage("hi", SESSION);

      expect(result.status).toBe("completed");
      expect(store.records).toEqual([]);
    });
  });
});

describe("toolErrorDocument", () => {
  it("uses null when the failure has no numeric code", () => {
    expect(toolErrorDocument(new ConciergeError("TOOL_UNAVAILABLE", "down"))).toBe(
      '{"error":{"code":null,"kind":"TOOL_UNAVAILABLE","message":"down"}}'
    );
  });
});
