import { z } from "zod";
import { v7 as uuidv7 } from "uuid";
import type { ChatMessage, JsonObject, JsonValue, ToolCall } from "@concierge/types";
import { JsonObjectSchema } from "@concierge/core";
import type { GenerationOptions, GenerationResult, ModelAdapter } from "./model-adapter.js";
import { malformedPayload, postProviderJson } from "./provider-http.js";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

export interface GeminiAdapterOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

const PartSchema = z.object({
  text: z.string().optional(),
  functionCall: z
    .object({
      name: z.string().min(1),
      args: JsonObjectSchema.optional(),
    })
    .optional(),
});

const ResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(PartSchema).default([]) }).optional(),
        finishReason: z.string().optional(),
      })
    )
    .min(1),
});

/**
 * ModelAdapter for Google Gemini's `generateContent` endpoint with function
 * calling.
 *
 * Gemini assigns no ids to function calls, so each one gets a fresh UUID; the
 * id is only used to pair our own tool messages. When a function response is
 * sent back it is matched to the call by name.
 */
export class GeminiAdapter implements ModelAdapter {
  readonly name = "Gemini";
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: GeminiAdapterOptions) {
    if (!opts.apiKey) throw new Error("Gemini API key is required");
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.baseUrl = (opts.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async generate(messages: ReadonlyArray<ChatMessage>, options: GenerationOptions): Promise<GenerationResult> {
    const { systemInstruction, contents } = this.convertMessages(messages);

    const generationConfig: JsonObject = {};
    if (options.temperature !== undefined) generationConfig.temperature = options.temperature;
    if (options.maxOutputTokens !== undefined) generationConfig.maxOutputTokens = options.maxOutputTokens;

    const body: { [key: string]: JsonValue } = { contents, generationConfig };
    if (systemInstruction) body.systemInstruction = systemInstruction;
    if (options.tools.length > 0) {
      body.tools = [
        {
          functionDeclarations: options.tools.map((t) => ({
            name: t.name,
            description: t.description,
            parameters: t.parameterSchema,
          })),
        },
      ];
    }

    const data = await postProviderJson({
      provider: this.name,
      url: `${this.baseUrl}/models/${this.model}:generateContent`,
      headers: { "x-goog-api-key": this.apiKey },
      body,
      signal: options.signal,
      fetch: this.fetchImpl,
    });

    const parsed = ResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw malformedPayload(this.name, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
    }

    const parts = parsed.data.candidates[0].content?.parts ?? [];
    const toolCalls: ToolCall[] = [];
    let text = "";
    for (const part of parts) {
      if (part.functionCall) {
        toolCalls.push({ id: uuidv7(), name: part.functionCall.name, arguments: part.functionCall.args ?? {} });
      } else if (part.text) {
        text += part.text;
      }
    }

    return { text, toolCalls };
  }

  /**
   * Convert our ChatMessage[] format to Gemini API's contents[] format.
   *
   * Gemini uses:
   * - `systemInstruction` for system messages (separate from contents)
   * - `contents[].role` = "user" | "model" | "function"
   * - `functionCall` / `functionResponse` parts for tool traffic
   */
  private convertMessages(messages: ReadonlyArray<ChatMessage>): {
    systemInstruction: JsonObject | null;
    contents: GeminiContent[];
  } {
    const systemTexts: string[] = [];
    const contents: GeminiContent[] = [];

    for (const msg of messages) {
      switch (msg.role) {
        case "system":
          systemTexts.push(msg.content);
          break;
        case "assistant": {
          const parts: JsonObject[] = [];
          if (msg.content) parts.push({ text: msg.content });
          for (const call of msg.toolCalls ?? []) {
            parts.push({ functionCall: { name: call.name, args: call.arguments } });
          }
          if (parts.length > 0) contents.push({ role: "model", parts });
          break;
        }
        case "tool":
          contents.push({
            role: "function",
            parts: [
              {
                functionResponse: {
                  name: msg.name ?? "tool",
                  response: { result: msg.content },
                },
              },
            ],
          });
          break;
        default:
          contents.push({ role: "user", parts: [{ text: msg.content }] });
      }
    }

    return {
      systemInstruction: systemTexts.length > 0 ? { parts: [{ text: systemTexts.join("\n\n") }] } : null,
      contents: mergeConsecutiveRoles(contents),
    };
  }
}

/**
 * Gemini API requires alternating roles.
 * If two consecutive messages have the same role, merge them.
 */
function mergeConsecutiveRoles(contents: GeminiContent[]): GeminiContent[] {
  const result: GeminiContent[] = [];

  for (const content of contents) {
    const last = result[result.length - 1];
    if (last && last.role === content.role) {
      last.parts.push(...content.parts);
    } else {
      result.push({ ...content, parts: [...content.parts] });
    }
  }

  return result;
}

// ─── Gemini API types ────────────────────────────────────────────────

type GeminiContent = {
  role: "user" | "model" | "function";
  parts: JsonObject[];
};
