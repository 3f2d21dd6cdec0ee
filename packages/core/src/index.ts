export * from "./schemas.js";
export * from "./errors.js";
export * from "./handle.js";
export * from "./deadline.js";
export * from "./config.js";
