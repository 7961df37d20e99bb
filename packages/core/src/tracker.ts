/**
 * Page transition tracker.
 *
 * Runs once per response. When the path just served is one of the tracked
 * boundaries, the pending dwell-time measurement (for the page the visitor
 * is leaving) is flushed to PageView and the session bookkeeping is reset
 * for the next interval.
 *
 * Per session: UNTRACKED → ON_HOME ⇄ ON_LEARN_MORE → ENDED, where ENDED has
 * no bookkeeping and behaves like UNTRACKED.
 */

import type Database from "better-sqlite3";
import { insertPageView } from "./db/index.js";
import type {
  PageLabel,
  PageViewRecord,
  VisitorSession,
} from "./types/index.js";

export type Transition =
  /** Flush, then start timing the given page */
  | { kind: "enter"; page: PageLabel }
  /** Flush, then drop the bookkeeping */
  | { kind: "end" };

/** Every tracked boundary and what crossing it does */
export const TRANSITIONS: ReadonlyMap<string, Transition> = new Map<
  string,
  Transition
>([
  ["/", { kind: "enter", page: "HomePage" }],
  ["/learn_more", { kind: "enter", page: "LearnMore" }],
  ["/confirmation", { kind: "end" }],
]);

export interface TrackResult {
  /** Transition applied, null for untracked paths */
  transition: Transition | null;

  /** Row written by the flush, null when nothing was pending */
  flushed: PageViewRecord | null;
}

/**
 * Look up the transition for a request URL.
 * The query string is ignored; paths must match exactly otherwise.
 */
export function resolveTransition(url: string): Transition | null {
  const queryStart = url.indexOf("?");
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  return TRANSITIONS.get(path) ?? null;
}

/**
 * Write the pending measurement, if the session has one.
 * Needs id, startTime and previousPage all present; otherwise a no-op.
 */
export function flushPageView(
  db: Database.Database,
  session: VisitorSession,
  now: Date
): PageViewRecord | null {
  const { id, startTime, previousPage } = session;
  if (id === undefined || startTime === undefined || previousPage === undefined) {
    return null;
  }

  const elapsedMs = now.getTime() - Date.parse(startTime);
  const record: PageViewRecord = {
    sessionId: id,
    page: previousPage,
    timeSpent: Math.max(0, elapsedMs) / 1000,
    startTime,
  };
  insertPageView(db, record);
  return record;
}

/**
 * Apply the transition table to a served path.
 * Mutates the session; the caller persists it.
 */
export function trackTransition(
  db: Database.Database,
  session: VisitorSession,
  url: string,
  now: Date
): TrackResult {
  const transition = resolveTransition(url);
  if (!transition) {
    return { transition: null, flushed: null };
  }

  // Read the old label before it is overwritten
  const flushed = flushPageView(db, session, now);

  switch (transition.kind) {
    case "enter":
      session.startTime = now.toISOString();
      session.previousPage = transition.page;
      break;
    case "end":
      delete session.startTime;
      delete session.previousPage;
      break;
  }

  return { transition, flushed };
}
