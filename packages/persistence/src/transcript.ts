import { ConciergeError, type ChatMessage } from "@concierge/types";

/**
 * Check that `appended` keeps the conversation well formed when added after
 * `existing`:
 * - only assistant messages carry `toolCalls`, with ids unique among open calls;
 * - every tool message answers exactly one open call;
 * - no call is left unanswered once `appended` has been applied.
 *
 * Throws `PROTOCOL_VIOLATION` on the first problem found.
 */
export function validateTranscript(
  existing: ReadonlyArray<ChatMessage>,
  appended: ReadonlyArray<ChatMessage>
): void {
  const open = new Set<string>();

  const visit = (msg: ChatMessage, index: number) => {
    if (msg.toolCalls && msg.toolCalls.length > 0) {
      if (msg.role !== "assistant") {
        throw violation(`${msg.role} message at ${index} carries tool calls`);
      }
      for (const call of msg.toolCalls) {
        if (open.has(call.id)) {
          throw violation(`Duplicate tool call id "${call.id}" at ${index}`);
        }
        open.add(call.id);
      }
    }

    if (msg.role === "tool") {
      if (!msg.toolCallId || !open.has(msg.toolCallId)) {
        throw violation(
          `Tool result at ${index} references unknown call id "${msg.toolCallId ?? ""}"`
        );
      }
      open.delete(msg.toolCallId);
    } else if (msg.toolCallId !== undefined) {
      throw violation(`${msg.role} message at ${index} carries a tool call id`);
    }
  };

  existing.forEach(visit);
  appended.forEach((msg, i) => visit(msg, existing.length + i));

  if (open.size > 0) {
    throw violation(`Unanswered tool calls: ${[...open].join(", ")}`);
  }
}

function violation(message: string): ConciergeError {
  return new ConciergeError("PROTOCOL_VIOLATION", message);
}
