import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { applySchema } from "./schema.js";

export type Db = Database.Database;

const clients = new Map<string, Db>();

/**
 * Open a store at `path` (or ":memory:") with the schema applied.
 * Each call returns a fresh connection; use getDatabase for the shared one.
 */
export function openDatabase(path: string): Db {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  applySchema(db);
  return db;
}

/** Lazily opened connection per path, shared across the process. */
export function getDatabase(path: string): Db {
  let db = clients.get(path);
  if (!db) {
    db = openDatabase(path);
    clients.set(path, db);
  }
  return db;
}

export function closeDatabase(path: string): void {
  const db = clients.get(path);
  if (!db) return;
  db.close();
  clients.delete(path);
}

/**
 * Run fn in a transaction. Nested calls become savepoints, so an inner failure
 * can be caught without discarding the outer batch.
 */
export function withTransaction<T>(db: Db, fn: () => T): T {
  return db.transaction(fn)();
}
