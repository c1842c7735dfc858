// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS run_state (
    id INTEGER PRIMARY KEY,
    last_run_at INTEGER NOT NULL
  );
  CREATE TABLE IF NOT EXISTS seen_items (
    identity TEXT PRIMARY KEY NOT NULL
  );
`;

export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.exec(CREATE_TABLES);

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type AppDatabase = BetterSQLite3Database<typeof schema>;
