import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

/** Paths scrubbed from every log line. */
export const REDACT_PATHS = [
  "apiKey",
  "*.apiKey",
  "config.llm.apiKey",
  "config.embedding.apiKey",
  "headers.authorization",
  "headers.Authorization",
];

/**
 * JSON logger on stdout. Silent under Vitest or `NODE_ENV=test`.
 * Level comes from `LOG_LEVEL`.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isTestTooling =
    process.env.VITEST === "true" || process.env.NODE_ENV === "test";

  return pino({
    level: process.env.LOG_LEVEL ?? "info",
    enabled: !isTestTooling,
    base: { ...bindings, service: process.env.SERVICE_NAME ?? "concierge" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  });
}

/** Keeps the `Logger` type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
