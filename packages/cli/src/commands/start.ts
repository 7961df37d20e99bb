/**
 * Start command - runs the site in the foreground.
 */

import { loadConfig } from "@dwell-tracker/core";
import { startTracker } from "@dwell-tracker/service";
import { loadEnvFile } from "../env-file.js";

export interface StartCommandOptions {
  envFile?: string;
  port?: string;
  db?: string;
}

export async function startCommand(
  options: StartCommandOptions = {}
): Promise<void> {
  // Load env file before anything else if specified
  if (options.envFile) {
    loadEnvFile(options.envFile);
  }

  const config = loadConfig();
  if (options.port !== undefined) {
    const port = parseInt(options.port, 10);
    if (Number.isNaN(port)) {
      throw new Error(`Invalid port: ${options.port}`);
    }
    config.listenPort = port;
  }
  if (options.db !== undefined) {
    config.dbPath = options.db;
  }

  await startTracker(config);
}
