import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";
import { ensureSchema } from "./schema";

export function openDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) mkdirSync(path.dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  if (!inMemory) db.pragma("journal_mode = WAL");
  ensureSchema(db);
  return db;
}
