#!/usr/bin/env node
/**
 * @dwell-tracker/cli
 *
 * CLI for the dwell tracker.
 * Commands: start, migrate
 */

import { Command } from "commander";
import { startCommand } from "./commands/start.js";
import { migrateCommand } from "./commands/migrate.js";

const program = new Command();

program
  .name("dwell-tracker")
  .description("Serve the tracked pages and record time on page")
  .version("0.1.0");

program
  .command("start")
  .description("Start the site")
  .option("-e, --env-file <path>", "Load environment variables from file")
  .option("-p, --port <port>", "Port to listen on")
  .option("--db <path>", "SQLite database path")
  .action(async (options) => {
    try {
      await startCommand(options);
    } catch (error) {
      console.error("Failed to start:", error);
      process.exit(1);
    }
  });

program
  .command("migrate")
  .description("Create or update the database schema")
  .option("--db <path>", "SQLite database path")
  .action((options) => {
    migrateCommand(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
