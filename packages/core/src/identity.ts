/**
 * Visitor identity assignment.
 *
 * Identities are 7-digit integers drawn at random. There is no uniqueness
 * check against identities already handed out, so two visitors can share
 * one (about a 1 in 9 million chance per pair).
 */

import { randomInt } from "node:crypto";
import type { VisitorSession } from "./types/index.js";

export const VISITOR_ID_MIN = 1_000_000;
export const VISITOR_ID_MAX = 9_999_999;

export type VisitorIdGenerator = () => number;

/** Draw a visitor id uniformly from [VISITOR_ID_MIN, VISITOR_ID_MAX] */
export function generateVisitorId(): number {
  // randomInt's upper bound is exclusive
  return randomInt(VISITOR_ID_MIN, VISITOR_ID_MAX + 1);
}

/**
 * Give the session an identity if it has none yet.
 * Returns true when an id was assigned by this call.
 */
export function assignVisitorId(
  session: VisitorSession,
  generate: VisitorIdGenerator = generateVisitorId
): boolean {
  if (session.id !== undefined) {
    return false;
  }
  session.id = generate();
  return true;
}
