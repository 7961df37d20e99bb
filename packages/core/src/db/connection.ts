/**
 * SQLite database connection management.
 * Uses better-sqlite3 sync API: one connection is opened per process and
 * shared by every request handler.
 */

import Database from "better-sqlite3";
import { mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";

/**
 * Opens or creates a SQLite database at the given path.
 * Ensures the parent directory exists.
 */
export function openDatabase(dbPath: string): Database.Database {
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  return new Database(dbPath);
}

/**
 * Creates an in-memory database for testing.
 */
export function openMemoryDatabase(): Database.Database {
  return new Database(":memory:");
}
