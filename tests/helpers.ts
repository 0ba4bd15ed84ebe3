import type { EmbeddingAdapter, JsonObject, ToolDescriptor, ToolRegistryClient } from "@concierge/types";

/** Bag-of-words hashing into a small fixed space. Same text, same vector. */
export function hashingEmbedder(dimensions = 16): EmbeddingAdapter & { calls: string[] } {
  const calls: string[] = [];
  return {
    dimensions,
    calls,
    async embed(text: string) {
      calls.push(text);
      const vector = new Array<number>(dimensions).fill(0);
      for (const word of text.toLowerCase().match(/[a-z]+/g) ?? []) {
        let h = 0;
        for (const ch of word) h = (h * 31 + ch.charCodeAt(0)) % 1_000_003;
        vector[h % dimensions] += 1;
      }
      return vector;
    },
  };
}

export const BOOKING_CATALOG: ToolDescriptor[] = [
  {
    name: "search_businesses",
    description: "Search businesses by service and city",
    parameterSchema: {
      type: "object",
      properties: { query: { type: "string" }, city: { type: "string" } },
      required: ["query"],
    },
  },
  {
    name: "create_booking",
    description: "Book an appointment",
    parameterSchema: { type: "object", properties: { business_id: { type: "string" } } },
  },
];

export interface RecordedCall {
  name: string;
  args: JsonObject;
}

/** Tool registry stand-in answering from a table of handlers. */
export function stubRegistry(
  handlers: Record<string, (args: JsonObject) => Promise<string>>
): ToolRegistryClient & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    async listTools() {
      return BOOKING_CATALOG;
    },
    async callTool(name: string, args: JsonObject) {
      calls.push({ name, args });
      const handler = handlers[name];
      if (!handler) throw new Error(`no stub for ${name}`);
      return handler(args);
    },
  };
}
