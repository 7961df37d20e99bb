/**
 * Contact button endpoint.
 * The Contact button on the home page links here; a recorded click sends
 * the visitor back home.
 */

import type { FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import { recordButtonClick } from "@dwell-tracker/core";

interface ClicksRoutesOptions {
  db: Database.Database;
}

export async function registerClicksRoutes(
  app: FastifyInstance,
  options: ClicksRoutesOptions
): Promise<void> {
  const { db } = options;

  app.get("/log_binary", async (request, reply) => {
    const click = recordButtonClick(db, request.visitorSession ?? {});

    // Only reachable when no identity was assigned: empty answer, no redirect
    if (!click) {
      return reply.code(204).send();
    }

    request.log.debug({ click }, "button click recorded");
    return reply.redirect("/");
  });
}
