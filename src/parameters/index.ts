export * from "./types.js";
export * from "./output-layer.js";
export * from "./factory.js";
export * from "./binding.js";
export * from "./validate.js";
export * from "./layer.js";
