/**
 * Location of the HTML pages served by the site.
 */

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * From sources: src/views.ts → ../views
 * From the build: dist/packages/service/src/views.js → repo packages/service/views
 */
export function getDefaultViewsDir(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));

  const sourcePath = join(__dirname, "..", "views");
  const builtPath = join(
    __dirname,
    "..",
    "..",
    "..",
    "..",
    "packages",
    "service",
    "views"
  );

  return existsSync(sourcePath) ? sourcePath : builtPath;
}
