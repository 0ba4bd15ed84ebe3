import "dotenv/config";
import { mkdirSync } from "node:fs";
import path from "node:path";
import type { TurnResult } from "@concierge/types";
import { ChatGateway, InMemoryEventBus, loadConfig, makeLogger } from "@concierge/core";
import {
  CachedSessionStore,
  SQLiteSessionStore,
  SQLiteSimilarityStore,
  openDatabase,
} from "@concierge/persistence";
import { McpToolRegistry } from "@concierge/tools";
import { Orchestrator, RagRetriever, createEmbeddingAdapter, createModelAdapter } from "@concierge/runtime";
import { createApp } from "./app.js";

const log = makeLogger({ app: "chat-server" });

async function bootstrap() {
  // 1. Configuration
  const config = await loadConfig({ configPath: process.env.CONCIERGE_CONFIG });

  // 2. Storage
  if (config.database.path !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(config.database.path)), { recursive: true });
  }
  const db = openDatabase(config.database.path);
  const sessions = new CachedSessionStore(new SQLiteSessionStore(db));

  // 3. Tool server. A failed handshake is not fatal; turns degrade until it is reachable.
  const tools = new McpToolRegistry({
    baseUrl: config.mcp.serverUrl,
    timeoutMs: config.mcp.timeoutMs,
    logger: log,
  });
  try {
    await tools.initialize();
  } catch (err) {
    log.warn({ err, url: config.mcp.serverUrl }, "tool server handshake failed");
  }

  // 4. Retrieval
  const retriever = config.rag.enabled
    ? new RagRetriever({
        embedder: createEmbeddingAdapter(config.embedding),
        store: new SQLiteSimilarityStore(db, { dimensions: config.embedding.dimensions }),
        topK: config.rag.topK,
        threshold: config.rag.threshold,
        timeoutMs: config.embedding.timeoutMs,
        logger: log,
      })
    : undefined;

  // 5. Orchestrator
  const bus = new InMemoryEventBus(log);
  bus.subscribe<Pick<TurnResult, "status" | "rounds">>({ topics: ["agent.complete"] }, (event) => {
    log.debug({ traceId: event.traceCtx.traceId, ...event.payload }, "turn complete");
  });

  const orchestrator = new Orchestrator({
    model: createModelAdapter(config.llm),
    tools,
    sessions,
    retriever,
    bus,
    logger: log,
    systemPrompt: config.orchestrator.systemPrompt,
    maxToolRounds: config.orchestrator.maxToolRounds,
    turnTimeoutMs: config.orchestrator.turnTimeoutMs,
    maxHistoryMessages: config.orchestrator.maxHistoryMessages,
    completionTimeoutMs: config.llm.timeoutMs,
    toolTimeoutMs: config.mcp.timeoutMs,
    completionRetry: { retries: config.llm.retries },
    temperature: config.llm.temperature,
    maxOutputTokens: config.llm.maxTokens,
  });

  // 6. HTTP
  const app = createApp({
    gateway: new ChatGateway({ handler: orchestrator, logger: log }),
    allowedOrigins: config.server.allowedOrigins,
    logger: log,
  });

  const server = app.listen(config.server.port, () => {
    log.info(
      { port: config.server.port, provider: config.llm.provider, model: config.llm.model, rag: config.rag.enabled },
      "chat server listening"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((err: unknown) => {
  log.fatal({ err }, "bootstrap failed");
  process.exit(1);
});
