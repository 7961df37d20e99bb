/**
 * Tests for the page transition tracker.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import {
  openMemoryDatabase,
  runMigrations,
  getDefaultMigrationsDir,
} from "./db/index.js";
import {
  flushPageView,
  resolveTransition,
  trackTransition,
} from "./tracker.js";
import type { VisitorSession } from "./types/index.js";

interface PageViewRow {
  session_id: number;
  page: string;
  time_spent: number;
  start_time: string;
}

const T0 = new Date("2026-01-01T10:00:00.000Z");

function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

describe("tracker", () => {
  let db: Database.Database;

  function pageViews(): PageViewRow[] {
    return db.prepare("SELECT * FROM PageView").all() as PageViewRow[];
  }

  beforeEach(() => {
    db = openMemoryDatabase();
    runMigrations(db, getDefaultMigrationsDir());
  });

  afterEach(() => {
    if (db.open) {
      db.close();
    }
  });

  describe("resolveTransition", () => {
    it("maps the three tracked boundaries", () => {
      expect(resolveTransition("/")).toEqual({ kind: "enter", page: "HomePage" });
      expect(resolveTransition("/learn_more")).toEqual({
        kind: "enter",
        page: "LearnMore",
      });
      expect(resolveTransition("/confirmation")).toEqual({ kind: "end" });
    });

    it("ignores the query string", () => {
      expect(resolveTransition("/learn_more?ref=nav")).toEqual({
        kind: "enter",
        page: "LearnMore",
      });
    });

    it("returns null for other paths", () => {
      expect(resolveTransition("/log_binary")).toBeNull();
      expect(resolveTransition("/learn_more/")).toBeNull();
      expect(resolveTransition("/static/site.css")).toBeNull();
    });
  });

  describe("flushPageView", () => {
    it("is a no-op without a start time", () => {
      const session: VisitorSession = { id: 1234567, previousPage: "HomePage" };
      expect(flushPageView(db, session, at(5))).toBeNull();
      expect(pageViews()).toEqual([]);
    });

    it("is a no-op without an id", () => {
      const session: VisitorSession = {
        startTime: T0.toISOString(),
        previousPage: "HomePage",
      };
      expect(flushPageView(db, session, at(5))).toBeNull();
      expect(pageViews()).toEqual([]);
    });

    it("writes elapsed seconds for a complete session", () => {
      const session: VisitorSession = {
        id: 1234567,
        startTime: T0.toISOString(),
        previousPage: "LearnMore",
      };

      const record = flushPageView(db, session, at(4.25));

      expect(record).toEqual({
        sessionId: 1234567,
        page: "LearnMore",
        timeSpent: 4.25,
        startTime: "2026-01-01T10:00:00.000Z",
      });
      expect(pageViews()).toEqual([
        {
          session_id: 1234567,
          page: "LearnMore",
          time_spent: 4.25,
          start_time: "2026-01-01T10:00:00.000Z",
        },
      ]);
    });

    it("never records negative time", () => {
      const session: VisitorSession = {
        id: 1234567,
        startTime: at(10).toISOString(),
        previousPage: "HomePage",
      };
      expect(flushPageView(db, session, T0)?.timeSpent).toBe(0);
    });

    it("propagates database failures", () => {
      const session: VisitorSession = {
        id: 1234567,
        startTime: T0.toISOString(),
        previousPage: "HomePage",
      };
      db.close();
      expect(() => flushPageView(db, session, at(1))).toThrow();
    });
  });

  describe("trackTransition", () => {
    it("starts timing on the first home visit without writing", () => {
      const session: VisitorSession = { id: 1234567 };

      const result = trackTransition(db, session, "/", T0);

      expect(result.flushed).toBeNull();
      expect(session).toEqual({
        id: 1234567,
        startTime: "2026-01-01T10:00:00.000Z",
        previousPage: "HomePage",
      });
      expect(pageViews()).toEqual([]);
    });

    it("writes one row on a second home visit", () => {
      const session: VisitorSession = { id: 1234567 };
      trackTransition(db, session, "/", T0);
      trackTransition(db, session, "/", at(1.5));

      expect(pageViews()).toEqual([
        {
          session_id: 1234567,
          page: "HomePage",
          time_spent: 1.5,
          start_time: "2026-01-01T10:00:00.000Z",
        },
      ]);
      expect(session.startTime).toBe(at(1.5).toISOString());
    });

    it("labels each row with the page being left", () => {
      const session: VisitorSession = { id: 1234567 };
      trackTransition(db, session, "/", T0);
      trackTransition(db, session, "/learn_more", at(2));
      trackTransition(db, session, "/confirmation", at(5));

      expect(pageViews()).toEqual([
        {
          session_id: 1234567,
          page: "HomePage",
          time_spent: 2,
          start_time: "2026-01-01T10:00:00.000Z",
        },
        {
          session_id: 1234567,
          page: "LearnMore",
          time_spent: 3,
          start_time: "2026-01-01T10:00:02.000Z",
        },
      ]);
      expect(session).toEqual({ id: 1234567 });
    });

    it("leaves untracked paths alone", () => {
      const session: VisitorSession = { id: 1234567 };
      trackTransition(db, session, "/", T0);

      const result = trackTransition(db, session, "/log_binary", at(3));

      expect(result).toEqual({ transition: null, flushed: null });
      expect(session.previousPage).toBe("HomePage");
      expect(session.startTime).toBe(T0.toISOString());
      expect(pageViews()).toEqual([]);
    });

    it("stops recording after confirmation until a tracked page is visited", () => {
      const session: VisitorSession = { id: 1234567 };
      trackTransition(db, session, "/", T0);
      trackTransition(db, session, "/confirmation", at(1));
      trackTransition(db, session, "/log_binary", at(2));
      trackTransition(db, session, "/confirmation", at(3));
      expect(pageViews()).toHaveLength(1);

      trackTransition(db, session, "/learn_more", at(4));
      trackTransition(db, session, "/", at(6));

      const rows = pageViews();
      expect(rows).toHaveLength(2);
      expect(rows[1]).toEqual({
        session_id: 1234567,
        page: "LearnMore",
        time_spent: 2,
        start_time: "2026-01-01T10:00:04.000Z",
      });
    });

    it("does nothing for a session ending without bookkeeping", () => {
      const session: VisitorSession = { id: 1234567 };
      const result = trackTransition(db, session, "/confirmation", T0);
      expect(result).toEqual({ transition: { kind: "end" }, flushed: null });
      expect(session).toEqual({ id: 1234567 });
    });
  });
});
