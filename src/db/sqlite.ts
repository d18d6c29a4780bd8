import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export const IN_MEMORY = ":memory:";

export function openDb(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    const storageDir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(storageDir)) fs.mkdirSync(storageDir, { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  // Another process holding the write lock makes us wait instead of failing at once.
  db.pragma("busy_timeout = 5000");
  return db;
}
