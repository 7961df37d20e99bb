/**
 * @dwell-tracker/core
 *
 * Types, SQLite persistence and the page transition tracker.
 */

export * from "./types/index.js";
export * from "./db/index.js";
export {
  loadConfig,
  getDefaultDbPath,
  LOG_LEVELS,
  type Config,
  type LogLevel,
} from "./config.js";
export * from "./identity.js";
export * from "./tracker.js";
export * from "./clicks.js";
