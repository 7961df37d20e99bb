/**
 * Contact button click logging.
 */

import type Database from "better-sqlite3";
import { insertButtonClick } from "./db/index.js";
import type { ButtonRecord, VisitorSession } from "./types/index.js";

/**
 * Record a click for the session's visitor.
 * Returns null, writing nothing, when the session has no identity.
 */
export function recordButtonClick(
  db: Database.Database,
  session: VisitorSession
): ButtonRecord | null {
  if (session.id === undefined) {
    return null;
  }
  return insertButtonClick(db, session.id);
}
