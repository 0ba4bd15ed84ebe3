import { z } from "zod";
import type { JsonObject, JsonValue } from "@concierge/types";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

/** `JSON.parse` without the `any`. */
export function parseJson(text: string): unknown {
  return JSON.parse(text);
}
