import {
  ConciergeError,
  type EmbeddingRecord,
  type RecordId,
  type SessionId,
  type SimilarityMatch,
  type SimilarityStore,
} from "@concierge/types";
import { openDatabase, type SqliteDatabase } from "./database.js";

export interface SQLiteSimilarityStoreOptions {
  /** Vector length of the collection. Fixed on first use. */
  dimensions: number;
  collection?: string;
}

/**
 * Cosine similarity of two equal-length vectors. A zero vector scores 0
 * against everything.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * SQLite-backed vector store with exact nearest-neighbour search.
 *
 * Each collection records its dimensionality in `collections` the first time
 * it is opened; reopening with another size fails. Vectors are stored as
 * Float32 blobs and compared with a full scan, so results are exact rather
 * than approximate. Ties keep insertion order.
 */
export class SQLiteSimilarityStore implements SimilarityStore {
  readonly dimensions: number;
  private readonly collection: string;
  private readonly db: SqliteDatabase;
  private readonly ownsDb: boolean;

  constructor(dbOrPath: SqliteDatabase | string, opts: SQLiteSimilarityStoreOptions) {
    if (!Number.isInteger(opts.dimensions) || opts.dimensions <= 0) {
      throw new ConciergeError("CONFIG_ERROR", `Invalid embedding dimensions: ${opts.dimensions}`);
    }
    this.ownsDb = typeof dbOrPath === "string";
    this.db = typeof dbOrPath === "string" ? openDatabase(dbOrPath) : dbOrPath;
    this.collection = opts.collection ?? "conversation_embeddings";
    this.dimensions = opts.dimensions;
    this.migrate();
    this.claimCollection();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name        TEXT PRIMARY KEY,
        dimensions  INTEGER NOT NULL,
        created_at  TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS embeddings (
        seq         INTEGER PRIMARY KEY AUTOINCREMENT,
        id          TEXT NOT NULL UNIQUE,
        collection  TEXT NOT NULL REFERENCES collections(name),
        owner_id    TEXT NOT NULL,
        text        TEXT NOT NULL,
        vector      BLOB NOT NULL,
        created_at  TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_embeddings_collection
        ON embeddings(collection, seq);
    `);
  }

  private claimCollection(): void {
    this.db
      .prepare<[string, number, string]>(
        "INSERT OR IGNORE INTO collections (name, dimensions, created_at) VALUES (?, ?, ?)"
      )
      .run(this.collection, this.dimensions, new Date().toISOString());

    const row = this.db
      .prepare<[string], { dimensions: number }>(
        "SELECT dimensions FROM collections WHERE name = ?"
      )
      .get(this.collection);

    if (row && row.dimensions !== this.dimensions) {
      throw new ConciergeError(
        "CONFIG_ERROR",
        `Collection "${this.collection}" holds ${row.dimensions}-d vectors, not ${this.dimensions}-d`
      );
    }
  }

  async insert(record: EmbeddingRecord): Promise<void> {
    this.assertDimensions(record.vector, "insert");
    try {
      this.db
        .prepare<[string, string, string, string, Buffer, string]>(`
          INSERT INTO embeddings (id, collection, owner_id, text, vector, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(
          record.id,
          this.collection,
          record.ownerId,
          record.text,
          encodeVector(record.vector),
          record.createdAt
        );
    } catch (err) {
      throw new ConciergeError("STORAGE_FAILURE", `Embedding insert failed for ${record.id}`, {
        cause: err,
        details: { recordId: record.id },
      });
    }
  }

  async queryNearest(vector: ReadonlyArray<number>, k: number): Promise<SimilarityMatch[]> {
    this.assertDimensions(vector, "query");
    if (k <= 0) return [];

    let rows: EmbeddingRow[];
    try {
      rows = this.db
        .prepare<[string], EmbeddingRow>(
          "SELECT * FROM embeddings WHERE collection = ? ORDER BY seq ASC"
        )
        .all(this.collection);
    } catch (err) {
      throw new ConciergeError("STORAGE_FAILURE", "Similarity query failed", { cause: err });
    }

    // Array.prototype.sort is stable, so equal scores keep insertion order.
    return rows
      .map((row) => {
        const stored = decodeVector(row.vector);
        return { record: toRecord(row, stored), score: cosineSimilarity(vector, stored) };
      })
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  /** Close the database connection if this store opened it. */
  close(): void {
    if (this.ownsDb) this.db.close();
  }

  private assertDimensions(vector: ReadonlyArray<number>, op: string): void {
    if (vector.length !== this.dimensions) {
      throw new ConciergeError(
        "STORAGE_FAILURE",
        `Cannot ${op} a ${vector.length}-d vector in a ${this.dimensions}-d collection`,
        { details: { reason: "dimension_mismatch", expected: this.dimensions, actual: vector.length } }
      );
    }
  }
}

export function encodeVector(vector: ReadonlyArray<number>): Buffer {
  return Buffer.from(Float32Array.from(vector).buffer);
}

export function decodeVector(blob: Buffer): number[] {
  // Copy first: the driver's buffer is not guaranteed to be 4-byte aligned.
  const bytes = Uint8Array.from(blob);
  return Array.from(new Float32Array(bytes.buffer, 0, bytes.byteLength / 4));
}

function toRecord(row: EmbeddingRow, vector: number[]): EmbeddingRecord {
  return {
    id: row.id as RecordId,
    ownerId: row.owner_id as SessionId,
    text: row.text,
    vector,
    createdAt: row.created_at,
  };
}

interface EmbeddingRow {
  seq: number;
  id: string;
  collection: string;
  owner_id: string;
  text: string;
  vector: Buffer;
  created_at: string;
}
