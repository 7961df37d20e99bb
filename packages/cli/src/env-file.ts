/**
 * Environment file loading for `start --env-file`.
 */

import { existsSync, readFileSync } from "node:fs";

/**
 * Load environment variables from a file.
 * Parses KEY=VALUE lines, ignoring comments and empty lines.
 * Variables already present in the environment win.
 */
export function loadEnvFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): void {
  if (!existsSync(filePath)) {
    throw new Error(`Env file not found: ${filePath}`);
  }

  const lines = readFileSync(filePath, "utf-8").split("\n");

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex <= 0) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}
