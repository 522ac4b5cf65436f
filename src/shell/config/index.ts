// CHANGE: Single import point for SHELL configuration helpers
// SOURCE: n/a

export { parseCLIArgs } from "./cli.js";
export { loadSweepConfig, validateSweepConfig } from "./loader.js";
export type { FieldResult, JSONValue } from "./loader.js";
