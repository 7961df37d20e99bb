/**
 * @dwell-tracker/service
 *
 * Serves the tracked pages and records dwell time and button clicks
 * into SQLite.
 */

import {
  loadConfig,
  openDatabase,
  runMigrations,
  getDefaultMigrationsDir,
  type Config,
} from "@dwell-tracker/core";
import { createServer, startServer } from "./server.js";

export { createServer, startServer, type CreateServerOptions } from "./server.js";
export {
  createMemorySessionStore,
  registerSessionHooks,
  type SessionStore,
} from "./session-store.js";
export { getDefaultViewsDir } from "./views.js";

export interface TrackerHandle {
  shutdown: () => Promise<void>;
}

/**
 * Start the site with the given (or environment) configuration.
 * Used by the CLI and for direct execution.
 */
export async function startTracker(
  config: Config = loadConfig()
): Promise<TrackerHandle> {
  console.log("Starting dwell tracker...");
  console.log(`Database: ${config.dbPath}`);

  const db = openDatabase(config.dbPath);

  for (const filename of runMigrations(db, getDefaultMigrationsDir())) {
    console.log(`Applied migration: ${filename}`);
  }

  const app = await createServer({
    db,
    cookieName: config.sessionCookieName,
    logLevel: config.logLevel,
  });
  await startServer(app, config.listenPort, config.host);

  const shutdown = async () => {
    console.log("\nShutting down...");
    await app.close();
    db.close();
  };

  const exitAfterShutdown = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", exitAfterShutdown);
  process.once("SIGTERM", exitAfterShutdown);

  return { shutdown };
}

// Run if executed directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  startTracker().catch((error: unknown) => {
    console.error("Failed to start:", error);
    process.exit(1);
  });
}
