import Database from "better-sqlite3";

export type SqliteDb = Database.Database;

/** Runs `fn` inside a transaction; nested calls become savepoints. */
export function withTransaction<T>(db: SqliteDb, fn: () => T): T {
  return db.transaction(fn)();
}

export function openDatabase(path: string): SqliteDb {
  const db = new Database(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");
  return db;
}

export function closeDatabase(db: SqliteDb): void {
  if (db.open) {
    db.close();
  }
}
