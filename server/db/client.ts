import * as schema from "@server/db/schema";
import { applyMigrations } from "@server/db/migrate";
import Database from "better-sqlite3";
import type { RunResult } from "better-sqlite3";
import {
  drizzle,
  type BetterSQLite3Database,
} from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Anything that can run queries synchronously: the database itself or a
 * transaction opened on it.
 */
export type DbExecutor = BaseSQLiteDatabase<"sync", RunResult, typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close(): void;
}

/**
 * Open (or create) the SQLite database at `databasePath` and bring its schema
 * up to date. Pass ":memory:" for a throwaway database.
 */
export function openDatabase(databasePath: string): DatabaseHandle {
  const sqlite = new Database(databasePath);
  sqlite.pragma("foreign_keys = ON");
  if (databasePath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  const db = drizzle(sqlite, { schema });
  applyMigrations(db);

  return {
    db,
    close: () => sqlite.close(),
  };
}
