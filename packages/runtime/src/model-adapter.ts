import { ConciergeError, type ChatMessage, type ToolCall, type ToolDescriptor } from "@concierge/types";

export interface GenerationOptions {
  /** Catalog offered to the model for this completion. */
  readonly tools: ReadonlyArray<ToolDescriptor>;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly signal?: AbortSignal;
}

/**
 * One model completion. Either `toolCalls` is non-empty, or `text` is the
 * final answer.
 */
export interface GenerationResult {
  text: string;
  toolCalls: ToolCall[];
}

/**
 * Abstraction over the underlying LLM.
 * `generate()` receives the full prompt and the tool catalog and returns the
 * model's response. Vendor adapters map every failure to
 * `PROVIDER_UNAVAILABLE`; `retryable` says whether trying again may help.
 */
export interface ModelAdapter {
  readonly name: string;
  generate(messages: ReadonlyArray<ChatMessage>, options: GenerationOptions): Promise<GenerationResult>;
}

/** A scripted step: a fixed result, a thrown error, or a function of the prompt. */
export type ScriptStep =
  | GenerationResult
  | Error
  | ((messages: ReadonlyArray<ChatMessage>, options: GenerationOptions) => GenerationResult | Promise<GenerationResult>);

/**
 * A model adapter for tests and local runs.
 * Plays back `steps` in order; once they run out the last one repeats, so a
 * single step describes a model that always answers the same way.
 */
export class ScriptedModelAdapter implements ModelAdapter {
  readonly name = "scripted";
  /** Every prompt the adapter was called with, copied at call time. */
  readonly calls: Array<{ messages: ChatMessage[]; options: GenerationOptions }> = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    if (steps.length === 0) throw new Error("ScriptedModelAdapter needs at least one step");
    this.steps = steps;
  }

  async generate(messages: ReadonlyArray<ChatMessage>, options: GenerationOptions): Promise<GenerationResult> {
    const index = Math.min(this.calls.length, this.steps.length - 1);
    this.calls.push({ messages: [...messages], options });
    const step = this.steps[index];

    if (step instanceof Error) throw step;
    if (typeof step === "function") return step(messages, options);
    return { text: step.text, toolCalls: [...step.toolCalls] };
  }
}

/** Shorthand for a final-answer step. */
export function replyWith(text: string): GenerationResult {
  return { text, toolCalls: [] };
}

/** Shorthand for a step requesting tools. */
export function callTools(...toolCalls: ToolCall[]): GenerationResult {
  return { text: "", toolCalls };
}

/** Shorthand for a provider outage. */
export function providerDown(message = "provider down", retryable = true): ConciergeError {
  return new ConciergeError("PROVIDER_UNAVAILABLE", message, { retryable });
}
