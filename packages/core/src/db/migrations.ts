/**
 * SQLite migrations runner.
 * Reads *.sql files from migrations folder and applies them in order.
 */

import type Database from "better-sqlite3";
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Runs all pending migrations from the migrations folder.
 * Creates _migrations tracking table if it doesn't exist.
 * Returns the filenames applied by this call.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string
): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      filename TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    (db.prepare("SELECT filename FROM _migrations").all() as {
      filename: string;
    }[]).map((row) => row.filename)
  );

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const appliedNow: string[] = [];
  for (const filename of files) {
    if (applied.has(filename)) {
      continue;
    }

    const sql = readFileSync(join(migrationsDir, filename), "utf-8");

    db.transaction(() => {
      db.exec(sql);
      db.prepare("INSERT INTO _migrations (filename) VALUES (?)").run(filename);
    })();

    appliedNow.push(filename);
  }

  return appliedNow;
}

/**
 * Gets the default migrations directory path.
 * From sources: src/db/migrations.ts → ../../migrations
 * From the build: dist/packages/core/src/db/migrations.js → repo packages/core/migrations
 */
export function getDefaultMigrationsDir(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));

  const sourcePath = join(__dirname, "..", "..", "migrations");
  const builtPath = join(
    __dirname,
    "..",
    "..",
    "..",
    "..",
    "..",
    "packages",
    "core",
    "migrations"
  );

  return existsSync(sourcePath) ? sourcePath : builtPath;
}
