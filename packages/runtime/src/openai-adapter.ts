import { z } from "zod";
import type { ChatMessage, JsonObject, JsonValue, ToolCall, ToolDescriptor } from "@concierge/types";
import { JsonObjectSchema, parseJson } from "@concierge/core";
import type { GenerationOptions, GenerationResult, ModelAdapter } from "./model-adapter.js";
import { malformedPayload, postProviderJson } from "./provider-http.js";

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export interface OpenAIAdapterOptions {
  apiKey: string;
  model: string;
  /** Any OpenAI-compatible `/chat/completions` host. Defaults to Groq. */
  baseUrl?: string;
  /** Label used in error messages. */
  providerName?: string;
  fetch?: typeof fetch;
}

const ResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().min(1),
                type: z.string().optional(),
                function: z.object({ name: z.string().min(1), arguments: z.string() }),
              })
            )
            .nullish(),
        }),
      })
    )
    .min(1),
});

/**
 * ModelAdapter for the OpenAI chat-completions wire format with native tool
 * calling. Groq serves the same format, so it is the default host.
 */
export class OpenAIAdapter implements ModelAdapter {
  readonly name: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: OpenAIAdapterOptions) {
    if (!opts.apiKey) throw new Error("OpenAI-compatible API key is required");
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.baseUrl = (opts.baseUrl ?? GROQ_BASE_URL).replace(/\/+$/, "");
    this.name = opts.providerName ?? "Groq";
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async generate(messages: ReadonlyArray<ChatMessage>, options: GenerationOptions): Promise<GenerationResult> {
    const body: { [key: string]: JsonValue } = {
      model: this.model,
      messages: messages.map(toWireMessage),
    };
    if (options.tools.length > 0) {
      body.tools = options.tools.map(toWireTool);
      body.tool_choice = "auto";
    }
    if (options.temperature !== undefined) body.temperature = options.temperature;
    if (options.maxOutputTokens !== undefined) body.max_tokens = options.maxOutputTokens;

    const data = await postProviderJson({
      provider: this.name,
      url: `${this.baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body,
      signal: options.signal,
      fetch: this.fetchImpl,
    });

    const parsed = ResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw malformedPayload(this.name, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
    }

    const message = parsed.data.choices[0].message;
    const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: this.parseArguments(tc.function.name, tc.function.arguments),
    }));

    return { text: message.content ?? "", toolCalls };
  }

  /** Arguments arrive as a JSON string; an empty string means no arguments. */
  private parseArguments(tool: string, raw: string): JsonObject {
    if (raw.trim() === "") return {};
    let value: unknown;
    try {
      value = parseJson(raw);
    } catch {
      throw malformedPayload(this.name, [`arguments of "${tool}" are not valid JSON`]);
    }
    const args = JsonObjectSchema.safeParse(value);
    if (!args.success) {
      throw malformedPayload(this.name, [`arguments of "${tool}" are not a JSON object`]);
    }
    return args.data;
  }
}

function toWireMessage(m: ChatMessage): JsonObject {
  switch (m.role) {
    case "tool":
      return { role: "tool", tool_call_id: m.toolCallId ?? "", content: m.content };
    case "assistant":
      if (m.toolCalls && m.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: m.content === "" ? null : m.content,
          tool_calls: m.toolCalls.map((tc) => ({
            id: tc.id,
            type: "function",
            function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
          })),
        };
      }
      return { role: "assistant", content: m.content };
    default:
      return { role: m.role, content: m.content };
  }
}

function toWireTool(tool: ToolDescriptor): JsonObject {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameterSchema,
    },
  };
}
