import { ConciergeError } from "@concierge/types";
import type { ConciergeConfig } from "@concierge/core";
import type { ModelAdapter } from "./model-adapter.js";
import { OpenAIAdapter } from "./openai-adapter.js";
import { GeminiAdapter } from "./gemini-adapter.js";
import { GeminiEmbeddingAdapter } from "./embedding-adapter.js";

/** The completion adapter for the configured provider. */
export function createModelAdapter(llm: ConciergeConfig["llm"], fetchImpl?: typeof fetch): ModelAdapter {
  switch (llm.provider) {
    case "groq":
      return new OpenAIAdapter({ apiKey: llm.apiKey, model: llm.model, baseUrl: llm.baseUrl, fetch: fetchImpl });
    case "google":
      return new GeminiAdapter({ apiKey: llm.apiKey, model: llm.model, baseUrl: llm.baseUrl, fetch: fetchImpl });
  }
}

export function createEmbeddingAdapter(
  embedding: ConciergeConfig["embedding"],
  fetchImpl?: typeof fetch
): GeminiEmbeddingAdapter {
  if (!embedding.apiKey) {
    throw new ConciergeError("CONFIG_ERROR", "GOOGLE_AI_API_KEY not set for embeddings");
  }
  return new GeminiEmbeddingAdapter({
    apiKey: embedding.apiKey,
    model: embedding.model,
    dimensions: embedding.dimensions,
    fetch: fetchImpl,
  });
}
