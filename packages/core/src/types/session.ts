/**
 * Visitor session types.
 * A visitor session lives for one browser session and carries the
 * bookkeeping the transition tracker needs between requests.
 */

/** Label written to PageView.page for each tracked page */
export type PageLabel = "HomePage" | "LearnMore";

/**
 * Server-side state for one visitor.
 * All fields are optional: a brand-new session has none of them, and the
 * terminal page removes the tracking fields again.
 */
export interface VisitorSession {
  /** Random 7-digit visitor identity, assigned on the first request */
  id?: number;

  /** When the visitor entered the currently tracked page (ISO 8601) */
  startTime?: string;

  /** Label of the currently tracked page, written on the next flush */
  previousPage?: PageLabel;
}
