import Database from "better-sqlite3";

export type SqliteDatabase = Database.Database;

/**
 * Open (or create) a SQLite database shared by the session and similarity
 * stores. Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}
