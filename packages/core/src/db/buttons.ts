/**
 * Button click inserts.
 */

import type Database from "better-sqlite3";
import type { ButtonRecord } from "../types/index.js";

/** Record a Contact button click for a visitor */
export function insertButtonClick(
  db: Database.Database,
  sessionId: number
): ButtonRecord {
  const record: ButtonRecord = { sessionId, button: 1 };
  db.prepare("INSERT INTO Button (session_id, button) VALUES (?, ?)").run(
    record.sessionId,
    record.button
  );
  return record;
}
