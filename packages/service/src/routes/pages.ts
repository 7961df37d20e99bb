/**
 * Static page routes.
 * The tracker keys on these paths, so they must match TRANSITIONS in core.
 */

import type { FastifyInstance } from "fastify";
import { readFileSync } from "node:fs";
import { join } from "node:path";

interface PagesRoutesOptions {
  viewsDir: string;
}

const PAGES = [
  { path: "/", view: "index.html" },
  { path: "/learn_more", view: "learn_more.html" },
  { path: "/confirmation", view: "done.html" },
] as const;

export async function registerPagesRoutes(
  app: FastifyInstance,
  options: PagesRoutesOptions
): Promise<void> {
  for (const page of PAGES) {
    const html = readFileSync(join(options.viewsDir, page.view), "utf-8");

    app.get(page.path, async (_request, reply) => {
      return reply.type("text/html; charset=utf-8").send(html);
    });
  }
}
