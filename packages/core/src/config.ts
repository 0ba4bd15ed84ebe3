import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { ConciergeError } from "@concierge/types";

const DEFAULT_MODELS = {
  groq: "llama-3.1-8b-instant",
  google: "gemini-2.0-flash-exp",
} as const;

const booleanish = z.preprocess(
  (v) => (typeof v === "string" ? !["false", "0", "no", "off"].includes(v.toLowerCase()) : v),
  z.boolean()
);

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.coerce.number().int().min(0).max(65535).default(3000),
      allowedOrigins: z.array(z.string()).default(["http://localhost:8080"]),
    })
    .default({}),
  mcp: z
    .object({
      serverUrl: z.string().url().default("http://localhost:8002"),
      timeoutMs: z.coerce.number().int().positive().default(15_000),
    })
    .default({}),
  llm: z
    .object({
      provider: z.enum(["groq", "google"]).default("groq"),
      apiKey: z.string().min(1).optional(),
      model: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
      temperature: z.coerce.number().min(0).max(2).default(0.7),
      maxTokens: z.coerce.number().int().positive().default(2000),
      timeoutMs: z.coerce.number().int().positive().default(30_000),
      retries: z.coerce.number().int().min(0).max(5).default(2),
    })
    .default({}),
  embedding: z
    .object({
      apiKey: z.string().min(1).optional(),
      model: z.string().min(1).default("text-embedding-004"),
      dimensions: z.coerce.number().int().positive().default(768),
      timeoutMs: z.coerce.number().int().positive().default(10_000),
    })
    .default({}),
  rag: z
    .object({
      enabled: booleanish.default(true),
      topK: z.coerce.number().int().positive().default(5),
      threshold: z.coerce.number().min(-1).max(1).default(0.7),
    })
    .default({}),
  orchestrator: z
    .object({
      maxToolRounds: z.coerce.number().int().positive().default(5),
      turnTimeoutMs: z.coerce.number().int().positive().default(60_000),
      maxHistoryMessages: z.coerce.number().int().positive().default(40),
      systemPrompt: z.string().optional(),
    })
    .default({}),
  database: z
    .object({
      path: z.string().min(1).default("data/concierge.db"),
    })
    .default({}),
});

type ParsedConfig = z.infer<typeof ConfigSchema>;

export type ConciergeConfig = Omit<ParsedConfig, "llm" | "embedding"> & {
  readonly llm: ParsedConfig["llm"] & { readonly apiKey: string; readonly model: string };
  /** `apiKey` is guaranteed only while `rag.enabled`. */
  readonly embedding: ParsedConfig["embedding"] & { readonly apiKey?: string };
};

type EnvBinding = readonly [name: string, path: readonly string[], parse?: (raw: string) => unknown];

/** Environment variables and where they land in the config tree. */
const ENV_BINDINGS: readonly EnvBinding[] = [
  ["AGENT_PORT", ["server", "port"]],
  ["ALLOWED_ORIGINS", ["server", "allowedOrigins"], (v) => v.split(",").map((s) => s.trim()).filter(Boolean)],
  ["MCP_SERVER_URL", ["mcp", "serverUrl"]],
  ["MCP_TIMEOUT_MS", ["mcp", "timeoutMs"]],
  ["LLM_PROVIDER", ["llm", "provider"], (v) => v.toLowerCase()],
  ["LLM_MODEL", ["llm", "model"]],
  ["LLM_BASE_URL", ["llm", "baseUrl"]],
  ["LLM_TEMPERATURE", ["llm", "temperature"]],
  ["LLM_MAX_TOKENS", ["llm", "maxTokens"]],
  ["LLM_TIMEOUT_MS", ["llm", "timeoutMs"]],
  ["LLM_RETRIES", ["llm", "retries"]],
  ["EMBEDDING_MODEL", ["embedding", "model"]],
  ["EMBEDDING_DIMENSIONS", ["embedding", "dimensions"]],
  ["RAG_ENABLED", ["rag", "enabled"]],
  ["RAG_TOP_K", ["rag", "topK"]],
  ["RAG_THRESHOLD", ["rag", "threshold"]],
  ["MAX_TOOL_ROUNDS", ["orchestrator", "maxToolRounds"]],
  ["TURN_TIMEOUT_MS", ["orchestrator", "turnTimeoutMs"]],
  ["MAX_HISTORY_MESSAGES", ["orchestrator", "maxHistoryMessages"]],
  ["SYSTEM_PROMPT", ["orchestrator", "systemPrompt"]],
  ["DATABASE_PATH", ["database", "path"]],
];

export interface LoadConfigOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Optional YAML file; environment variables win over its values. */
  readonly configPath?: string;
}

/**
 * Load configuration from an optional YAML file overlaid with environment
 * variables, then validate it.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<ConciergeConfig> {
  const env = opts.env ?? process.env;
  const raw = opts.configPath ? await readYaml(opts.configPath) : {};

  for (const [name, path, parse] of ENV_BINDINGS) {
    const value = env[name];
    if (value === undefined || value === "") continue;
    setPath(raw, path, parse ? parse(value) : value);
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConciergeError("CONFIG_ERROR", `Invalid configuration: ${issues.join("; ")}`, {
      details: { issues },
    });
  }
  const parsed = result.data;

  const googleKey = env.GOOGLE_AI_API_KEY || env.GOOGLE_API_KEY;
  const llmKey =
    parsed.llm.apiKey ??
    (parsed.llm.provider === "google" ? googleKey : env.GROQ_API_KEY || env.GROQ_KEY);
  if (!llmKey) {
    const expected = parsed.llm.provider === "google" ? "GOOGLE_AI_API_KEY" : "GROQ_API_KEY";
    throw new ConciergeError("CONFIG_ERROR", `${expected} not set`);
  }

  const embeddingKey = parsed.embedding.apiKey ?? googleKey;
  if (parsed.rag.enabled && !embeddingKey) {
    throw new ConciergeError("CONFIG_ERROR", "GOOGLE_AI_API_KEY not set for embeddings");
  }

  return {
    ...parsed,
    llm: {
      ...parsed.llm,
      apiKey: llmKey,
      model: parsed.llm.model ?? DEFAULT_MODELS[parsed.llm.provider],
    },
    embedding: { ...parsed.embedding, apiKey: embeddingKey },
  };
}

async function readYaml(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (err) {
    throw new ConciergeError("CONFIG_ERROR", `Cannot read config file ${path}`, { cause: err });
  }

  const doc: unknown = yaml.load(text);
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) {
    throw new ConciergeError("CONFIG_ERROR", `Config file ${path} must contain a mapping`);
  }
  return doc;
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
