export * from "./dispatcher.js";
export * from "./node-fs-store.js";
