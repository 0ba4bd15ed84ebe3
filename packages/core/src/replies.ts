import type { ErrorCode } from "@concierge/types";

/** Final message when the model keeps requesting tools past the round bound. */
export const ROUND_LIMIT_REPLY =
  "I was unable to complete this request after several attempts.";

/** User-facing apology for each failure kind. Never a raw protocol error. */
export const DEGRADED_REPLIES: Readonly<Record<ErrorCode, string>> = {
  PROVIDER_UNAVAILABLE:
    "The assistant is temporarily unavailable. Please try again in a moment.",
  TOOL_UNAVAILABLE:
    "The booking tools are currently unavailable. Please try again shortly.",
  TOOL_EXECUTION_FAILED:
    "Sorry, something went wrong while processing your request.",
  PROTOCOL_VIOLATION:
    "Sorry, something went wrong while processing your request.",
  TURN_TIMEOUT:
    "Sorry, this request took too long to complete. Please try again.",
  STORAGE_FAILURE:
    "Sorry, your conversation could not be saved. Please try again.",
  CONFIG_ERROR:
    "The assistant is not configured correctly. Please contact support.",
};

/** Reply for failures that escaped the error taxonomy. */
export const INTERNAL_ERROR_REPLY =
  "Sorry, something went wrong on our side. Please try again.";
