export * from "./constants.js";
export * from "./errors.js";
export * from "./types.js";
export * from "./schemas.js";
export * from "./origin.js";
export * from "./config.js";
