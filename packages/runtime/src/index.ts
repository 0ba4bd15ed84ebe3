export { Orchestrator, toolErrorDocument } from "./orchestrator.js";
export type { OrchestratorOptions, TurnOptions } from "./orchestrator.js";
export { RagRetriever, formatContext, CONTEXT_HEADER } from "./rag-retriever.js";
export type { RagRetrieverOptions, RetrievalResult, RetrievedSnippet } from "./rag-retriever.js";
export { buildPrompt, windowHistory, DEFAULT_SYSTEM_PROMPT } from "./prompt-builder.js";
export type { PromptParts } from "./prompt-builder.js";
export { ScriptedModelAdapter, replyWith, callTools, providerDown } from "./model-adapter.js";
export type {
  ModelAdapter,
  GenerationOptions,
  GenerationResult,
  ScriptStep,
} from "./model-adapter.js";
export { OpenAIAdapter, GROQ_BASE_URL } from "./openai-adapter.js";
export type { OpenAIAdapterOptions } from "./openai-adapter.js";
export { GeminiAdapter, GEMINI_BASE_URL } from "./gemini-adapter.js";
export type { GeminiAdapterOptions } from "./gemini-adapter.js";
export { GeminiEmbeddingAdapter } from "./embedding-adapter.js";
export type { GeminiEmbeddingAdapterOptions } from "./embedding-adapter.js";
export { createModelAdapter, createEmbeddingAdapter } from "./factory.js";
