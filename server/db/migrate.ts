import type { AppDatabase } from "@server/db/client";
import { migrate } from "drizzle-orm/better-sqlite3/migrator";
import { fileURLToPath } from "node:url";

export const MIGRATIONS_DIR = fileURLToPath(
  new URL("../../drizzle", import.meta.url),
);

/**
 * Apply every migration listed in `drizzle/meta/_journal.json` that has not
 * run on this database yet. Applied migrations are tracked by drizzle in
 * `__drizzle_migrations`.
 */
export function applyMigrations(
  db: AppDatabase,
  migrationsFolder: string = MIGRATIONS_DIR,
): void {
  migrate(db, { migrationsFolder });
}
