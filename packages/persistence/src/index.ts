export { SQLiteSessionStore } from "./session-store.js";
export { CachedSessionStore } from "./cached-session-store.js";
export {
  SQLiteSimilarityStore,
  cosineSimilarity,
  encodeVector,
  decodeVector,
} from "./similarity-store.js";
export type { SQLiteSimilarityStoreOptions } from "./similarity-store.js";
export { validateTranscript } from "./transcript.js";
export { openDatabase } from "./database.js";
export type { SqliteDatabase } from "./database.js";
