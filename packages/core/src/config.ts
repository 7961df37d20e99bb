/**
 * Configuration management.
 * Reads from environment variables with sensible defaults.
 */

import { homedir } from "node:os";
import { join } from "node:path";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Get the default database path in user's home directory */
export function getDefaultDbPath(): string {
  return join(homedir(), ".dwell-tracker", "dwell-tracker.sqlite");
}

export interface Config {
  /** Port for the site to listen on (default: 3000) */
  listenPort: number;

  /** Interface to bind (default: 127.0.0.1) */
  host: string;

  /** Path to SQLite database file (default: ~/.dwell-tracker/dwell-tracker.sqlite) */
  dbPath: string;

  /** Name of the cookie carrying the session token */
  sessionCookieName: string;

  /** Fastify logger level */
  logLevel: LogLevel;
}

function parsePort(raw: string | undefined, fallback: number): number {
  const port = parseInt(raw ?? "", 10);
  return Number.isNaN(port) ? fallback : port;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(): Config {
  const listenPort = parsePort(process.env["DT_LISTEN_PORT"], 3000);
  const host = process.env["DT_HOST"] ?? "127.0.0.1";
  const dbPath = process.env["DT_DB_PATH"] ?? getDefaultDbPath();
  const sessionCookieName = process.env["DT_SESSION_COOKIE"] ?? "dt_session";
  const logLevelRaw = process.env["DT_LOG_LEVEL"] ?? "info";
  const logLevel = isLogLevel(logLevelRaw) ? logLevelRaw : "info";

  return {
    listenPort,
    host,
    dbPath,
    sessionCookieName,
    logLevel,
  };
}
