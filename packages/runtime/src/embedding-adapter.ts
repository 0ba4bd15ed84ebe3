import { z } from "zod";
import type { EmbeddingAdapter } from "@concierge/types";
import { GEMINI_BASE_URL } from "./gemini-adapter.js";
import { malformedPayload, postProviderJson } from "./provider-http.js";

export interface GeminiEmbeddingAdapterOptions {
  apiKey: string;
  model?: string;
  /** Expected vector length; answers of another length are rejected. */
  dimensions: number;
  baseUrl?: string;
  fetch?: typeof fetch;
}

const EmbedResponseSchema = z.object({
  embedding: z.object({ values: z.array(z.number()).min(1) }),
});

/** Text → vector through Gemini's `embedContent` endpoint. */
export class GeminiEmbeddingAdapter implements EmbeddingAdapter {
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: GeminiEmbeddingAdapterOptions) {
    if (!opts.apiKey) throw new Error("Gemini API key is required for embeddings");
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? "text-embedding-004";
    this.dimensions = opts.dimensions;
    this.baseUrl = (opts.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const data = await postProviderJson({
      provider: "Gemini embeddings",
      url: `${this.baseUrl}/models/${this.model}:embedContent`,
      headers: { "x-goog-api-key": this.apiKey },
      body: {
        model: `models/${this.model}`,
        content: { parts: [{ text }] },
      },
      signal,
      fetch: this.fetchImpl,
    });

    const parsed = EmbedResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw malformedPayload("Gemini embeddings", parsed.error.issues.map((i) => i.message));
    }

    const values = parsed.data.embedding.values;
    if (values.length !== this.dimensions) {
      throw malformedPayload("Gemini embeddings", [
        `expected ${this.dimensions} dimensions, got ${values.length}`,
      ]);
    }
    return values;
  }
}
