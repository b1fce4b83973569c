import { pino } from "pino";

export { createNodeLogger, errorFields, withComponent } from "./node.js";
export * from "./redaction.js";
export * from "./types.js";

export type { Logger } from "pino";
export { pino };
