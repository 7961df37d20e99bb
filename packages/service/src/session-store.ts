/**
 * Server-side visitor sessions.
 * The browser only holds an opaque token cookie; the session itself lives
 * in a SessionStore, is loaded when a request arrives and is saved after the
 * tracker has run on the response.
 */

import type { FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import type { CookieSerializeOptions } from "@fastify/cookie";
import { randomUUID } from "node:crypto";
import { LRUCache } from "lru-cache";
import {
  assignVisitorId,
  generateVisitorId,
  trackTransition,
  type VisitorIdGenerator,
  type VisitorSession,
} from "@dwell-tracker/core";

declare module "fastify" {
  interface FastifyRequest {
    /** Session loaded for this request, null until onRequest ran */
    visitorSession: VisitorSession | null;
    sessionToken: string | null;
  }
}

// No expiry: the cookie ends with the browser session
const SESSION_COOKIE_OPTIONS: CookieSerializeOptions = {
  path: "/",
  httpOnly: true,
  sameSite: "lax",
};

export interface SessionStore {
  get(token: string): VisitorSession | undefined;
  set(token: string, session: VisitorSession): void;
}

export interface MemorySessionStoreOptions {
  /** Most sessions kept; the least recently used go first (default: 10000) */
  max?: number;

  /** Idle time after which a session is dropped (default: 24 hours) */
  ttlMs?: number;
}

/**
 * In-process store. Sessions are lost when the process exits and are
 * evicted when idle or when the store is full.
 * Values are copied in and out so a request only sees its own snapshot.
 */
export function createMemorySessionStore(
  options: MemorySessionStoreOptions = {}
): SessionStore {
  const sessions = new LRUCache<string, VisitorSession>({
    max: options.max ?? 10_000,
    ttl: options.ttlMs ?? 24 * 60 * 60 * 1000,
    updateAgeOnGet: true,
  });

  return {
    get(token) {
      const session = sessions.get(token);
      return session ? structuredClone(session) : undefined;
    },
    set(token, session) {
      sessions.set(token, structuredClone(session));
    },
  };
}

export interface SessionHooksOptions {
  db: Database.Database;
  store: SessionStore;
  cookieName: string;
  clock: () => Date;
  generateVisitorId?: VisitorIdGenerator;
}

/**
 * Load (or start) a session on every request and run the transition
 * tracker on every response.
 * Requires @fastify/cookie to be registered first.
 */
export function registerSessionHooks(
  app: FastifyInstance,
  options: SessionHooksOptions
): void {
  const { db, store, cookieName, clock } = options;
  const generate = options.generateVisitorId ?? generateVisitorId;

  app.decorateRequest("visitorSession", null);
  app.decorateRequest("sessionToken", null);

  app.addHook("onRequest", async (request, reply) => {
    let token = request.cookies[cookieName];
    let session = token !== undefined ? store.get(token) : undefined;

    if (token === undefined || session === undefined) {
      token = randomUUID();
      session = {};
      reply.setCookie(cookieName, token, SESSION_COOKIE_OPTIONS);
    }

    if (assignVisitorId(session, generate)) {
      request.log.debug({ visitorId: session.id }, "visitor id assigned");
    }

    request.visitorSession = session;
    request.sessionToken = token;
  });

  app.addHook("onSend", async (request, _reply, payload) => {
    const session = request.visitorSession;
    const token = request.sessionToken;
    if (session === null || token === null) {
      return payload;
    }

    // Matched route pattern: percent-escapes already decoded, unset on 404
    const routePath = request.routeOptions.url;
    if (routePath !== undefined) {
      const { flushed } = trackTransition(db, session, routePath, clock());
      if (flushed) {
        request.log.debug({ pageView: flushed }, "page view recorded");
      }
    }

    store.set(token, session);
    return payload;
  });
}
