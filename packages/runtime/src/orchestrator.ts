import type { Logger } from "pino";
import {
  ConciergeError,
  isConciergeError,
  toConciergeError,
  type ChatMessage,
  type ConversationHandler,
  type ErrorCode,
  type EventBus,
  type EventTopic,
  type SessionId,
  type SessionStore,
  type ToolCall,
  type ToolCallRequest,
  type ToolCallResult,
  type ToolDescriptor,
  type ToolRegistryClient,
  type TraceContext,
  type TurnResult,
} from "@concierge/types";
import {
  DEGRADED_REPLIES,
  Deadline,
  ROUND_LIMIT_REPLY,
  createEvent,
  createTraceContext,
  makeNoopLogger,
  retryWithBackoff,
  withTimeout,
  type RetryPolicy,
} from "@concierge/core";
import type { GenerationResult, ModelAdapter } from "./model-adapter.js";
import { buildPrompt, DEFAULT_SYSTEM_PROMPT } from "./prompt-builder.js";
import { formatContext, type RagRetriever } from "./rag-retriever.js";

export interface OrchestratorOptions {
  model: ModelAdapter;
  tools: ToolRegistryClient;
  sessions: SessionStore;
  /** Without a retriever there is no context lookup and nothing is embedded. */
  retriever?: RagRetriever;
  bus?: EventBus;
  logger?: Logger;
  /** Persona prompt. An empty string sends none. */
  systemPrompt?: string;
  maxToolRounds?: number;
  turnTimeoutMs?: number;
  maxHistoryMessages?: number;
  completionTimeoutMs?: number;
  toolTimeoutMs?: number;
  completionRetry?: Partial<RetryPolicy>;
  temperature?: number;
  maxOutputTokens?: number;
  /** Clock for the turn budget. */
  now?: () => number;
  /** Backoff sleep between completion retries. */
  sleep?: (ms: number) => Promise<void>;
}

export interface TurnOptions {
  /** Continue an existing trace instead of starting one. */
  traceCtx?: TraceContext;
}

/** Tool failures the model is told about instead of aborting the turn. */
const REPORTED_TOOL_FAILURES: ReadonlySet<ErrorCode> = new Set(["TOOL_EXECUTION_FAILED", "TOOL_UNAVAILABLE"]);

/**
 * The tool-calling loop.
 *
 * One turn walks `Start → AwaitingCompletion → (ExecutingTools →
 * AwaitingCompletion)* → Done` as a plain loop bounded by `maxToolRounds`.
 * The turn's messages are collected in a buffer and written with a single
 * `append`, so the stored history never holds a tool request without all of
 * its results.
 *
 * Provider, tool-listing and protocol failures come back as a `degraded`
 * result with an apology and nothing stored. A timed-out turn stores the
 * user message and every fully executed round. Storage failures are thrown;
 * `details.pendingMessages` carries what could not be saved.
 */
export class Orchestrator implements ConversationHandler {
  private readonly model: ModelAdapter;
  private readonly tools: ToolRegistryClient;
  private readonly sessions: SessionStore;
  private readonly retriever?: RagRetriever;
  private readonly bus?: EventBus;
  private readonly log: Logger;
  private readonly systemPrompt: string;
  private readonly maxToolRounds: number;
  private readonly turnTimeoutMs: number;
  private readonly maxHistoryMessages: number;
  private readonly completionTimeoutMs: number;
  private readonly toolTimeoutMs: number;
  private readonly completionRetry: Partial<RetryPolicy>;
  private readonly temperature?: number;
  private readonly maxOutputTokens?: number;
  private readonly now: () => number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(opts: OrchestratorOptions) {
    this.model = opts.model;
    this.tools = opts.tools;
    this.sessions = opts.sessions;
    this.retriever = opts.retriever;
    this.bus = opts.bus;
    this.log = (opts.logger ?? makeNoopLogger()).child({ component: "orchestrator" });
    this.systemPrompt = opts.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.maxToolRounds = opts.maxToolRounds ?? 5;
    this.turnTimeoutMs = opts.turnTimeoutMs ?? 60_000;
    this.maxHistoryMessages = opts.maxHistoryMessages ?? 40;
    this.completionTimeoutMs = opts.completionTimeoutMs ?? 30_000;
    this.toolTimeoutMs = opts.toolTimeoutMs ?? 15_000;
    this.completionRetry = opts.completionRetry ?? {};
    this.temperature = opts.temperature;
    this.maxOutputTokens = opts.maxOutputTokens;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep;

    if (!Number.isInteger(this.maxToolRounds) || this.maxToolRounds < 1) {
      throw new ConciergeError("CONFIG_ERROR", `maxToolRounds must be a positive integer, got ${this.maxToolRounds}`);
    }
  }

  async processMessage(message: string, sessionId: SessionId, options: TurnOptions = {}): Promise<TurnResult> {
    const trace = options.traceCtx ?? createTraceContext();
    const log = this.log.child({ sessionId, traceId: trace.traceId });
    const deadline = new Deadline(this.turnTimeoutMs, this.now);

    const turn: ChatMessage[] = [{ role: "user", content: message, timestamp: new Date().toISOString() }];
    // Length of the turn prefix that is safe to store: the user message plus complete rounds.
    let settled = turn.length;
    let rounds = 0;
    let queryVector: number[] | undefined;

    log.info({ length: message.length }, "turn started");
    await this.emit("agent.turn", { sessionId, message }, trace);

    try {
      const session = await deadline.race(
        this.sessions.loadOrCreate(sessionId).catch((err: unknown) => {
          throw toConciergeError(err, "STORAGE_FAILURE");
        })
      );

      const retrieved = await this.retrieveContext(message, deadline, log);
      queryVector = retrieved.queryVector;

      const catalog = await deadline.race(
        this.tools.listTools().catch((err: unknown) => {
          throw toConciergeError(err, "TOOL_UNAVAILABLE");
        })
      );
      const known = new Set(catalog.map((t) => t.name));

      for (;;) {
        const prompt = buildPrompt({
          systemPrompt: this.systemPrompt,
          context: retrieved.context,
          history: session.history,
          turn,
          maxHistoryMessages: this.maxHistoryMessages,
        });

        const completion = await deadline.race(this.complete(prompt, catalog, log));

        if (completion.toolCalls.length === 0) {
          if (completion.text.trim() === "") {
            throw new ConciergeError("PROTOCOL_VIOLATION", "Model returned neither text nor tool calls");
          }
          turn.push({ role: "assistant", content: completion.text, timestamp: new Date().toISOString() });
          return await this.finish(sessionId, message, turn, queryVector, "completed", rounds, trace, log);
        }

        if (rounds >= this.maxToolRounds) {
          log.warn({ rounds }, "round limit reached");
          turn.push({ role: "assistant", content: ROUND_LIMIT_REPLY, timestamp: new Date().toISOString() });
          return await this.finish(sessionId, message, turn, queryVector, "round_limit", rounds, trace, log);
        }

        checkToolCalls(completion.toolCalls, known);
        turn.push({
          role: "assistant",
          content: completion.text,
          toolCalls: completion.toolCalls,
          timestamp: new Date().toISOString(),
        });

        for (const call of completion.toolCalls) {
          const output = await deadline.race(this.executeTool(call, deadline.signal, trace, log));
          turn.push({
            role: "tool",
            content: output,
            toolCallId: call.id,
            name: call.name,
            timestamp: new Date().toISOString(),
          });
        }

        rounds++;
        settled = turn.length;
      }
    } catch (err) {
      if (!isConciergeError(err)) {
        log.error({ err }, "turn crashed");
        await this.emit("agent.error", { sessionId, code: "INTERNAL", message: String(err) }, trace);
        throw err;
      }

      await this.emit("agent.error", { sessionId, code: err.code, message: err.message }, trace);

      if (err.code === "STORAGE_FAILURE") {
        log.error({ err }, "turn could not be stored");
        throw "pendingMessages" in err.details ? err : withPending(err, turn);
      }

      if (err.code === "TURN_TIMEOUT") {
        const prefix = turn.slice(0, settled);
        log.warn({ rounds, kept: prefix.length }, "turn timed out");
        await this.store(sessionId, prefix);
      } else {
        log.warn({ err, code: err.code, rounds }, "turn degraded");
      }

      return {
        response: DEGRADED_REPLIES[err.code],
        sessionId,
        status: "degraded",
        error: err.code,
        rounds,
      };
    }
  }

  /** Embed and look up the user message. Any failure means no context, never a failed turn. */
  private async retrieveContext(
    message: string,
    deadline: Deadline,
    log: Logger
  ): Promise<{ context?: string; queryVector?: number[] }> {
    if (!this.retriever) return {};
    try {
      const { snippets, queryVector } = await deadline.race(this.retriever.retrieve(message));
      return { context: formatContext(snippets), queryVector };
    } catch (err) {
      if (isConciergeError(err) && err.code === "TURN_TIMEOUT") throw err;
      log.warn({ err }, "context retrieval failed, continuing without it");
      return {};
    }
  }

  private async complete(
    prompt: ChatMessage[],
    catalog: ToolDescriptor[],
    log: Logger
  ): Promise<GenerationResult> {
    return retryWithBackoff(
      () =>
        withTimeout(
          (signal) =>
            this.model.generate(prompt, {
              tools: catalog,
              temperature: this.temperature,
              maxOutputTokens: this.maxOutputTokens,
              signal,
            }),
          this.completionTimeoutMs,
          () =>
            new ConciergeError(
              "PROVIDER_UNAVAILABLE",
              `${this.model.name} completion timed out after ${this.completionTimeoutMs}ms`
            )
        ).catch((err: unknown) => {
          throw toConciergeError(err, "PROVIDER_UNAVAILABLE");
        }),
      {
        policy: this.completionRetry,
        sleep: this.sleep,
        onRetry: (err, attempt, delayMs) =>
          log.warn({ err, attempt, delayMs, provider: this.model.name }, "completion failed, retrying"),
      }
    );
  }

  /** Run one tool call. Remote failures become an error document for the model. */
  private async executeTool(
    call: ToolCall,
    turnSignal: AbortSignal,
    trace: TraceContext,
    log: Logger
  ): Promise<string> {
    const request: ToolCallRequest = { callId: call.id, tool: call.name, args: call.arguments };
    await this.emit("tool.request", request, trace);

    const started = this.now();
    let output: string;
    let success: boolean;
    try {
      output = await withTimeout(
        (signal) => this.tools.callTool(call.name, call.arguments, AbortSignal.any([signal, turnSignal])),
        this.toolTimeoutMs,
        () => new ConciergeError("TOOL_UNAVAILABLE", `Tool "${call.name}" timed out after ${this.toolTimeoutMs}ms`)
      );
      success = true;
    } catch (err) {
      const failure = toConciergeError(err, "TOOL_UNAVAILABLE");
      if (!REPORTED_TOOL_FAILURES.has(failure.code)) throw failure;
      output = toolErrorDocument(failure);
      success = false;
    }

    const durationMs = this.now() - started;
    log.info({ tool: call.name, callId: call.id, success, durationMs }, "tool call finished");
    const result: ToolCallResult = { callId: call.id, tool: call.name, success, output, durationMs };
    await this.emit("tool.result", result, trace);
    return output;
  }

  private async finish(
    sessionId: SessionId,
    message: string,
    turn: ChatMessage[],
    queryVector: number[] | undefined,
    status: "completed" | "round_limit",
    rounds: number,
    trace: TraceContext,
    log: Logger
  ): Promise<TurnResult> {
    await this.store(sessionId, turn);

    if (this.retriever && queryVector) {
      try {
        await this.retriever.remember(sessionId, message, queryVector);
      } catch (err) {
        throw new ConciergeError("STORAGE_FAILURE", "Turn stored but its embedding was not", {
          cause: err,
          details: { sessionId, pendingMessages: [] },
        });
      }
    }

    const last = turn[turn.length - 1];
    log.info({ status, rounds, messages: turn.length }, "turn finished");
    await this.emit("agent.complete", { sessionId, status, rounds, message: last.content }, trace);
    return { response: last.content, sessionId, status, rounds };
  }

  private async store(sessionId: SessionId, messages: ChatMessage[]): Promise<void> {
    try {
      await this.sessions.append(sessionId, messages);
    } catch (err) {
      throw withPending(toConciergeError(err, "STORAGE_FAILURE"), messages);
    }
  }

  private async emit<T>(topic: EventTopic, payload: T, trace: TraceContext): Promise<void> {
    if (!this.bus) return;
    await this.bus.publish(createEvent(topic, payload, createTraceContext(trace)));
  }
}

/** Reject a completion that names an unlisted tool or repeats a call id. */
function checkToolCalls(calls: ReadonlyArray<ToolCall>, known: ReadonlySet<string>): void {
  const ids = new Set<string>();
  for (const call of calls) {
    if (!known.has(call.name)) {
      throw new ConciergeError("PROTOCOL_VIOLATION", `Model requested unknown tool "${call.name}"`, {
        details: { tool: call.name },
      });
    }
    if (ids.has(call.id)) {
      throw new ConciergeError("PROTOCOL_VIOLATION", `Duplicate tool call id "${call.id}" in one completion`);
    }
    ids.add(call.id);
  }
}

/** `{"error":{"code","kind","message"}}`, the tool message for a failed call. */
export function toolErrorDocument(err: ConciergeError): string {
  const code = err.details.code;
  return JSON.stringify({
    error: {
      code: typeof code === "number" ? code : null,
      kind: err.code,
      message: err.message,
    },
  });
}

/** Storage failure carrying the messages that were not saved. */
function withPending(err: ConciergeError, pending: ReadonlyArray<ChatMessage>): ConciergeError {
  if (err.code !== "STORAGE_FAILURE") return err;
  return new ConciergeError("STORAGE_FAILURE", err.message, {
    cause: err.cause ?? err,
    traceCtx: err.traceCtx,
    details: { ...err.details, pendingMessages: [...pending] },
  });
}
