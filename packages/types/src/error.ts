import type { TraceContext } from "./observability.js";

/**
 * Every failure inside the middleware is mapped to one of these codes before
 * it reaches the chat surface.
 */
export type ErrorCode =
  | "PROVIDER_UNAVAILABLE"   // Completion or embedding provider unreachable, timed out or answered garbage
  | "TOOL_UNAVAILABLE"       // Tool server unreachable or listing failed
  | "TOOL_EXECUTION_FAILED"  // Tool server returned a well-formed error
  | "PROTOCOL_VIOLATION"     // Unknown tool, orphan tool result, malformed payload
  | "STORAGE_FAILURE"        // Session or similarity store read/write failed
  | "TURN_TIMEOUT"           // Per-turn wall-clock budget exhausted
  | "CONFIG_ERROR";          // Invalid or missing configuration

export interface ConciergeErrorOptions {
  readonly retryable?: boolean;
  readonly details?: Record<string, unknown>;
  readonly traceCtx?: TraceContext;
  /** The original error, if wrapping a lower-level failure. */
  readonly cause?: unknown;
}

const RETRYABLE_BY_DEFAULT: ReadonlySet<ErrorCode> = new Set([
  "PROVIDER_UNAVAILABLE",
]);

export class ConciergeError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details: Record<string, unknown>;
  readonly traceCtx?: TraceContext;

  constructor(code: ErrorCode, message: string, opts: ConciergeErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ConciergeError";
    this.code = code;
    this.retryable = opts.retryable ?? RETRYABLE_BY_DEFAULT.has(code);
    this.details = opts.details ?? {};
    this.traceCtx = opts.traceCtx;
  }
}

export function isConciergeError(err: unknown): err is ConciergeError {
  return err instanceof ConciergeError;
}

/** Wrap an unknown throwable, leaving `ConciergeError`s untouched. */
export function toConciergeError(
  err: unknown,
  fallback: ErrorCode,
  opts: Omit<ConciergeErrorOptions, "cause"> = {}
): ConciergeError {
  if (isConciergeError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ConciergeError(fallback, message, { ...opts, cause: err });
}
