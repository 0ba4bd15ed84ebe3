import type { ChatMessage } from "@concierge/types";

export const DEFAULT_SYSTEM_PROMPT = `You are a friendly booking concierge for local businesses.

# What you can do
- Search businesses and the services they offer
- Check staff and appointment availability
- Create, change and cancel bookings for customers

# Rules
1. Use the available tools to look things up; never invent businesses, times or prices.
2. Ask for any missing detail (date, time, service, name) before booking.
3. Confirm what was booked, with date and time, once a booking succeeds.
4. Keep replies short and in the customer's language.
`;

/**
 * Keep at most `max` trailing messages of `history`, starting at a user
 * message so that no tool result is separated from the assistant message
 * that requested it.
 */
export function windowHistory(history: ReadonlyArray<ChatMessage>, max: number): ChatMessage[] {
  if (history.length <= max) return [...history];
  for (let start = history.length - max; start < history.length; start++) {
    if (history[start].role === "user") return history.slice(start);
  }
  return [];
}

export interface PromptParts {
  /** Persona prompt; omitted when empty. */
  systemPrompt?: string;
  /** Retrieved context, already formatted. */
  context?: string;
  history: ReadonlyArray<ChatMessage>;
  /** Messages of the turn in progress, starting with the user message. */
  turn: ReadonlyArray<ChatMessage>;
  maxHistoryMessages: number;
}

/** Persona, then context, then the windowed history, then the current turn. */
export function buildPrompt(parts: PromptParts): ChatMessage[] {
  const prompt: ChatMessage[] = [];
  if (parts.systemPrompt) prompt.push({ role: "system", content: parts.systemPrompt });
  if (parts.context) prompt.push({ role: "system", content: parts.context });
  prompt.push(...windowHistory(parts.history, parts.maxHistoryMessages), ...parts.turn);
  return prompt;
}
