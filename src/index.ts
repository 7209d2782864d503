export * from "./errors.js";
export * from "./logger.js";
export * from "./network/codec.js";
export * from "./network/model.js";
export * from "./network/descriptor.js";
export * from "./network/describe.js";
export * from "./analysis/budget.js";
export * from "./analysis/store.js";
export * from "./analysis/types.js";
export * from "./analysis/synchronous.js";
export * from "./analysis/asynchronous.js";
export * from "./analysis/index.js";
export * from "./config/analysis.js";
