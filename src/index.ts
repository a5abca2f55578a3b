export * from "./types.js";
export * from "./core/config.js";
export * from "./core/errors.js";
export * from "./core/events.js";
export * from "./core/logger.js";
export * from "./core/tool.js";
export * from "./core/runner.js";
export * from "./discovery/index.js";
export * from "./parameters/index.js";
export * from "./output/index.js";
export * from "./core/toolbox.js";
