export * from "./observable.js";
export * from "./operators.js";
export * from "./rx.js";
export * from "./types.js";
