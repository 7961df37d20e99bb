/**
 * Rows written to the persistence sink.
 */

import type { PageLabel } from "./session.js";

/** A completed dwell-time measurement (PageView table) */
export interface PageViewRecord {
  sessionId: number;
  page: PageLabel;

  /** Seconds spent on the page, never negative */
  timeSpent: number;

  /** When the visitor entered the page (ISO 8601) */
  startTime: string;
}

/** A click on the tracked Contact button (Button table) */
export interface ButtonRecord {
  sessionId: number;

  /** Always 1: the row exists only because the button was clicked */
  button: 1;
}
