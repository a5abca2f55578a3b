export * from "./declarations.js";
export * from "./discover.js";
