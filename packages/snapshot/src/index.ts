export * from "./normalize.js";
export * from "./identity.js";
