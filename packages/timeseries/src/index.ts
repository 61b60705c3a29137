export * from "./replay.js";
export * from "./log.js";
export * from "./settings.js";
export * from "./sources/http.js";
export * from "./sources/git-history.js";
export * from "./sources/html.js";
export { main, usage, getFlagValue, VERSION } from "./cli/waitq.js";
export type { CliIo } from "./cli/waitq.js";
