export type { PageLabel, VisitorSession } from "./session.js";
export type { PageViewRecord, ButtonRecord } from "./records.js";
