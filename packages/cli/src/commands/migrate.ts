/**
 * Migrate command - creates the PageView and Button tables.
 */

import {
  loadConfig,
  openDatabase,
  runMigrations,
  getDefaultMigrationsDir,
} from "@dwell-tracker/core";

export interface MigrateCommandOptions {
  db?: string;
}

/**
 * Apply pending migrations and return the filenames applied.
 */
export function migrateCommand(options: MigrateCommandOptions = {}): string[] {
  const dbPath = options.db ?? loadConfig().dbPath;
  const db = openDatabase(dbPath);

  try {
    const applied = runMigrations(db, getDefaultMigrationsDir());
    if (applied.length === 0) {
      console.log(`Database is up to date: ${dbPath}`);
    }
    for (const filename of applied) {
      console.log(`Applied migration: ${filename}`);
    }
    return applied;
  } finally {
    db.close();
  }
}
