export * from "./callback-registry.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./subject.js";
export * from "./subscription.js";
export * from "./types.js";
