export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export { ChatGateway } from "./gateway.js";
export type { ChatGatewayOptions } from "./gateway.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { ConciergeConfig, LoadConfigOptions } from "./config.js";
export { makeLogger, makeNoopLogger, REDACT_PATHS } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  retryWithBackoff,
  withTimeout,
  backoffDelay,
  sleep,
  Deadline,
  DEFAULT_RETRY_POLICY,
} from "./retry.js";
export type { RetryPolicy, RetryOptions } from "./retry.js";
export { ROUND_LIMIT_REPLY, DEGRADED_REPLIES, INTERNAL_ERROR_REPLY } from "./replies.js";
export { JsonValueSchema, JsonObjectSchema, parseJson } from "./json.js";
