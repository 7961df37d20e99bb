/**
 * PageView inserts.
 * Append-only: each insert auto-commits on its own.
 */

import type Database from "better-sqlite3";
import type { PageViewRecord } from "../types/index.js";

/** Record one completed dwell-time measurement */
export function insertPageView(
  db: Database.Database,
  record: PageViewRecord
): void {
  db.prepare(
    "INSERT INTO PageView (session_id, page, time_spent, start_time) VALUES (?, ?, ?, ?)"
  ).run(record.sessionId, record.page, record.timeSpent, record.startTime);
}
