export * from "./schema.js";
export * from "./errors.js";
export * from "./validate.js";
export * from "./csv.js";
