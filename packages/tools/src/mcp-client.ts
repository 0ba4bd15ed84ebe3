import { z } from "zod";
import type { Logger } from "pino";
import {
  ConciergeError,
  isConciergeError,
  type JsonObject,
  type JsonValue,
  type ToolDescriptor,
  type ToolRegistryClient,
} from "@concierge/types";
import { JsonObjectSchema, makeNoopLogger, parseJson, withTimeout } from "@concierge/core";

export const MCP_PROTOCOL_VERSION = "2024-11-05";

/** JSON-RPC code used when a tool reports `isError` without one of its own. */
export const TOOL_ERROR_CODE = -32000;

const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string(), z.null()]),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.optional(),
});

const ListToolsResultSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().default(""),
      inputSchema: JsonObjectSchema.default({ type: "object" }),
    })
  ),
});

const CallToolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .default([]),
  isError: z.boolean().optional(),
});

type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

export interface McpToolRegistryOptions {
  /** Tool server root; requests go to `${baseUrl}/mcp`. */
  baseUrl: string;
  /** Per-request timeout. */
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
  clientInfo?: { name: string; version: string };
}

/**
 * Tool Registry Client speaking MCP (JSON-RPC 2.0 over HTTP POST).
 *
 * Request ids come from a counter owned by the instance: strictly increasing,
 * never reused, so concurrent in-flight calls always correlate. The id is
 * taken before the first `await`.
 *
 * Error mapping:
 * - transport failure, timeout, non-2xx → `TOOL_UNAVAILABLE`
 * - JSON-RPC `error`, or a result flagged `isError` → `TOOL_EXECUTION_FAILED`
 * - unparseable body, mismatched id, unknown tool name → `PROTOCOL_VIOLATION`
 */
export class McpToolRegistry implements ToolRegistryClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;
  private readonly clientInfo: { name: string; version: string };
  private nextRequestId = 1;
  private sessionHeader?: string;
  private listed = new Set<string>();

  constructor(opts: McpToolRegistryOptions) {
    this.endpoint = `${opts.baseUrl.replace(/\/+$/, "")}/mcp`;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.fetchImpl = opts.fetch ?? fetch;
    this.log = (opts.logger ?? makeNoopLogger()).child({ component: "mcp-client" });
    this.clientInfo = opts.clientInfo ?? { name: "concierge", version: "0.1.0" };
  }

  /** MCP handshake. Must succeed before the server accepts tool requests. */
  async initialize(): Promise<void> {
    try {
      await this.request("initialize", {
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: this.clientInfo,
      });
      await this.notify("notifications/initialized");
    } catch (err) {
      throw asUnavailable(err, "MCP initialization failed");
    }
    this.log.info({ endpoint: this.endpoint }, "mcp session initialized");
  }

  async listTools(): Promise<ToolDescriptor[]> {
    let tools: z.infer<typeof ListToolsResultSchema>["tools"];
    try {
      const result = await this.request("tools/list", {});
      const parsed = ListToolsResultSchema.safeParse(result);
      if (!parsed.success) {
        throw new ConciergeError("PROTOCOL_VIOLATION", "Malformed tools/list result", {
          details: { issues: parsed.error.issues.map((i) => i.message) },
        });
      }
      tools = parsed.data.tools;
    } catch (err) {
      throw asUnavailable(err, "Tool listing failed");
    }

    this.listed = new Set(tools.map((t) => t.name));
    return tools.map((t) => ({
      name: t.name,
      description: t.description,
      parameterSchema: t.inputSchema,
    }));
  }

  async callTool(name: string, args: JsonObject, signal?: AbortSignal): Promise<string> {
    if (!this.listed.has(name)) {
      throw new ConciergeError("PROTOCOL_VIOLATION", `Unknown tool "${name}"`, {
        details: { tool: name },
      });
    }

    const result = await this.request("tools/call", { name, arguments: args }, signal);
    const parsed = CallToolResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new ConciergeError("PROTOCOL_VIOLATION", `Malformed tools/call result from "${name}"`);
    }

    const text = parsed.data.content
      .map((c) => c.text ?? "")
      .filter((t) => t.length > 0)
      .join("\n");

    if (parsed.data.isError) {
      throw new ConciergeError("TOOL_EXECUTION_FAILED", text || `Tool "${name}" failed`, {
        details: { code: TOOL_ERROR_CODE, message: text, tool: name },
      });
    }
    return text;
  }

  /** Send one JSON-RPC request and return its `result`. */
  private async request(method: string, params: JsonObject, signal?: AbortSignal): Promise<unknown> {
    const id = this.nextRequestId++;
    const started = Date.now();
    this.log.debug({ id, method }, "mcp request");

    const response = await this.post({ jsonrpc: "2.0", id, method, params }, signal);
    const rpc = await this.readResponse(response, id);

    this.log.debug({ id, method, durationMs: Date.now() - started }, "mcp response");

    if (rpc.error) {
      throw new ConciergeError("TOOL_EXECUTION_FAILED", rpc.error.message, {
        details: { code: rpc.error.code, message: rpc.error.message, method },
      });
    }
    return rpc.result;
  }

  /** Fire a JSON-RPC notification (no id, no response body expected). */
  private async notify(method: string): Promise<void> {
    const response = await this.post({ jsonrpc: "2.0", method });
    // Release the connection; a notification's body carries nothing.
    await response.body?.cancel();
  }

  /** `signal` aborts the request alongside the client's own timeout. */
  private async post(body: { [key: string]: JsonValue }, signal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
    };
    if (this.sessionHeader) headers["Mcp-Session-Id"] = this.sessionHeader;

    let response: Response;
    try {
      response = await withTimeout(
        (timeoutSignal) =>
          this.fetchImpl(this.endpoint, {
            method: "POST",
            headers,
            body: JSON.stringify(body),
            signal: signal ? AbortSignal.any([timeoutSignal, signal]) : timeoutSignal,
          }),
        this.timeoutMs,
        () =>
          new ConciergeError("TOOL_UNAVAILABLE", `MCP request timed out after ${this.timeoutMs}ms`)
      );
    } catch (err) {
      if (signal?.aborted) throw asUnavailable(signal.reason, "MCP request aborted");
      throw asUnavailable(err, "MCP transport error");
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "");
      throw new ConciergeError("TOOL_UNAVAILABLE", `MCP HTTP error ${response.status}: ${errorText}`, {
        details: { status: response.status },
      });
    }

    const session = response.headers.get("mcp-session-id");
    if (session) this.sessionHeader = session;
    return response;
  }

  private async readResponse(response: Response, id: number): Promise<JsonRpcResponse> {
    const contentType = response.headers.get("content-type") ?? "";
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw asUnavailable(err, "MCP response body could not be read");
    }

    const candidates = contentType.includes("text/event-stream")
      ? eventStreamPayloads(text)
      : [text];

    for (const payload of candidates) {
      let value: unknown;
      try {
        value = parseJson(payload);
      } catch {
        continue;
      }
      const parsed = JsonRpcResponseSchema.safeParse(value);
      if (!parsed.success) continue;
      if (parsed.data.id !== id) {
        throw new ConciergeError(
          "PROTOCOL_VIOLATION",
          `MCP response id ${String(parsed.data.id)} does not match request id ${id}`
        );
      }
      return parsed.data;
    }

    throw new ConciergeError("PROTOCOL_VIOLATION", `Malformed MCP response to request ${id}`);
  }
}

/** `data:` payloads of a server-sent-events body, one per event. */
function eventStreamPayloads(body: string): string[] {
  return body
    .split(/\r?\n\r?\n/)
    .map((event) =>
      event
        .split(/\r?\n/)
        .filter((line) => line.startsWith("data:"))
        .map((line) => line.slice(5).trimStart())
        .join("\n")
    )
    .filter((data) => data.length > 0);
}

/** Anything that is not already a typed failure becomes `TOOL_UNAVAILABLE`. */
function asUnavailable(err: unknown, message: string): ConciergeError {
  if (isConciergeError(err) && err.code === "TOOL_UNAVAILABLE") return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new ConciergeError("TOOL_UNAVAILABLE", `${message}: ${reason}`, { cause: err });
}
