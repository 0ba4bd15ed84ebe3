import type { JsonObject } from "./foundational.js";

/**
 * A remote tool as advertised by the tool server.
 * Read-only to the orchestrator; `parameterSchema` is forwarded to the model
 * untouched.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameterSchema: JsonObject;
}

/**
 * Discovery and invocation of remote tools.
 *
 * `callTool` resolves with the tool's text output. Failures reject with a
 * `ConciergeError`: `TOOL_UNAVAILABLE` for transport problems,
 * `TOOL_EXECUTION_FAILED` for well-formed remote errors and
 * `PROTOCOL_VIOLATION` for names that were never listed. Once `signal`
 * aborts, the call should stop waiting on the remote side.
 */
export interface ToolRegistryClient {
  listTools(): Promise<ToolDescriptor[]>;
  callTool(name: string, args: JsonObject, signal?: AbortSignal): Promise<string>;
}

/** Published on the bus before a tool call is dispatched. */
export interface ToolCallRequest {
  readonly callId: string;
  readonly tool: string;
  readonly args: JsonObject;
}

/** Published on the bus once a tool call has resolved either way. */
export interface ToolCallResult {
  readonly callId: string;
  readonly tool: string;
  /** Whether the tool executed successfully. */
  readonly success: boolean;
  readonly output: string;
  /** Execution duration in milliseconds. */
  readonly durationMs: number;
}
