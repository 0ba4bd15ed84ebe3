import type { RecordId, SessionId, Timestamp } from "./foundational.js";

/** One stored user message and its embedding. Never mutated once written. */
export interface EmbeddingRecord {
  readonly id: RecordId;
  /** Non-owning back-reference to the conversation the text came from. */
  readonly ownerId: SessionId;
  readonly text: string;
  readonly vector: ReadonlyArray<number>;
  readonly createdAt: Timestamp;
}

export interface SimilarityMatch {
  readonly record: EmbeddingRecord;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

/**
 * Vector storage for one logical collection. Every vector in a collection
 * has the same dimensionality, fixed when the collection is created.
 */
export interface SimilarityStore {
  readonly dimensions: number;
  insert(record: EmbeddingRecord): Promise<void>;
  /** Matches ordered by descending score. */
  queryNearest(vector: ReadonlyArray<number>, k: number): Promise<SimilarityMatch[]>;
}

/** Text → fixed-length vector. */
export interface EmbeddingAdapter {
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
