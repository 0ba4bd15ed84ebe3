import type { Logger } from "pino";
import { v7 as uuidv7 } from "uuid";
import {
  ConciergeError,
  type EmbeddingAdapter,
  type EmbeddingRecord,
  type RecordId,
  type SessionId,
  type SimilarityStore,
} from "@concierge/types";
import { makeNoopLogger, retryWithBackoff, withTimeout, type RetryPolicy } from "@concierge/core";

export const CONTEXT_HEADER = "Relevant context from past conversations:";

export interface RetrievedSnippet {
  readonly recordId: RecordId;
  readonly ownerId: SessionId;
  readonly text: string;
  readonly score: number;
}

export interface RetrievalResult {
  /** Descending score, every one at or above the threshold. */
  readonly snippets: RetrievedSnippet[];
  /** The query embedding, reused when the query text is stored afterwards. */
  readonly queryVector: number[];
}

export interface RagRetrieverOptions {
  embedder: EmbeddingAdapter;
  store: SimilarityStore;
  topK?: number;
  threshold?: number;
  /** Per embedding request. */
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
}

/**
 * Finds stored user messages similar to a query.
 *
 * Raising the threshold can only remove snippets, never add or reorder them.
 */
export class RagRetriever {
  readonly topK: number;
  readonly threshold: number;
  private readonly embedder: EmbeddingAdapter;
  private readonly store: SimilarityStore;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryPolicy>;
  private readonly log: Logger;

  constructor(opts: RagRetrieverOptions) {
    if (opts.embedder.dimensions !== opts.store.dimensions) {
      throw new ConciergeError(
        "CONFIG_ERROR",
        `Embedding model yields ${opts.embedder.dimensions}-d vectors but the store holds ${opts.store.dimensions}-d`
      );
    }
    this.embedder = opts.embedder;
    this.store = opts.store;
    this.topK = opts.topK ?? 5;
    this.threshold = opts.threshold ?? 0.7;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.retry = opts.retry ?? {};
    this.log = (opts.logger ?? makeNoopLogger()).child({ component: "rag" });
  }

  /** Embed `text` with the per-request timeout and the retry policy. */
  async embed(text: string): Promise<number[]> {
    return retryWithBackoff(
      () =>
        withTimeout(
          (signal) => this.embedder.embed(text, signal),
          this.timeoutMs,
          () => new ConciergeError("PROVIDER_UNAVAILABLE", `Embedding timed out after ${this.timeoutMs}ms`)
        ),
      {
        policy: this.retry,
        onRetry: (err, attempt, delayMs) =>
          this.log.warn({ err, attempt, delayMs }, "embedding failed, retrying"),
      }
    );
  }

  async retrieve(query: string): Promise<RetrievalResult> {
    const queryVector = await this.embed(query);
    const matches = await this.store.queryNearest(queryVector, this.topK);

    const snippets = matches
      .filter((m) => m.score >= this.threshold)
      .map((m) => ({
        recordId: m.record.id,
        ownerId: m.record.ownerId,
        text: m.record.text,
        score: m.score,
      }));

    this.log.debug(
      { candidates: matches.length, kept: snippets.length, threshold: this.threshold },
      "context retrieved"
    );
    return { snippets, queryVector };
  }

  /** Store `text` so later queries can find it. */
  async remember(ownerId: SessionId, text: string, vector: number[]): Promise<EmbeddingRecord> {
    const record: EmbeddingRecord = {
      id: uuidv7() as RecordId,
      ownerId,
      text,
      vector,
      createdAt: new Date().toISOString(),
    };
    await this.store.insert(record);
    return record;
  }
}

/** Render snippets as one system message body, or nothing when there are none. */
export function formatContext(snippets: ReadonlyArray<RetrievedSnippet>): string | undefined {
  if (snippets.length === 0) return undefined;
  return [CONTEXT_HEADER, ...snippets.map((s) => `- ${s.text}`)].join("\n");
}
