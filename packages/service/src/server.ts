/**
 * Fastify server factory.
 * Creates and configures the site server.
 */

import Fastify, { type FastifyInstance } from "fastify";
import fastifyCookie from "@fastify/cookie";
import type Database from "better-sqlite3";
import type { LogLevel, VisitorIdGenerator } from "@dwell-tracker/core";
import {
  createMemorySessionStore,
  registerSessionHooks,
  type SessionStore,
} from "./session-store.js";
import { getDefaultViewsDir } from "./views.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerPagesRoutes } from "./routes/pages.js";
import { registerClicksRoutes } from "./routes/clicks.js";

export interface CreateServerOptions {
  db: Database.Database;
  store?: SessionStore;
  cookieName?: string;
  logLevel?: LogLevel;
  viewsDir?: string;

  /** Source of "now" for dwell-time measurements */
  clock?: () => Date;
  generateVisitorId?: VisitorIdGenerator;
}

/**
 * Create a configured Fastify server instance.
 */
export async function createServer(
  options: CreateServerOptions
): Promise<FastifyInstance> {
  const { db } = options;

  const app = Fastify({
    logger: { level: options.logLevel ?? "info" },
  });

  await app.register(fastifyCookie);

  registerSessionHooks(app, {
    db,
    store: options.store ?? createMemorySessionStore(),
    cookieName: options.cookieName ?? "dt_session",
    clock: options.clock ?? (() => new Date()),
    generateVisitorId: options.generateVisitorId,
  });

  // Register routes
  await registerHealthRoutes(app);
  await registerPagesRoutes(app, {
    viewsDir: options.viewsDir ?? getDefaultViewsDir(),
  });
  await registerClicksRoutes(app, { db });

  return app;
}

/**
 * Start listening.
 */
export async function startServer(
  app: FastifyInstance,
  port: number,
  host: string
): Promise<void> {
  await app.listen({ port, host });
  console.log(`Dwell tracker listening on http://${host}:${port}`);
}
