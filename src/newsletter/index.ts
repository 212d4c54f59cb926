export { createApp, stateFilePath } from "./app.js";
export type { App, AppOptions } from "./app.js";
export { loadConfig, parseRedirectors } from "./config.js";
export type { IngestConfig } from "./config.js";
export * from "./core/index.js";
export * from "./graph/index.js";
export * from "./pipeline/index.js";
export * from "./store/index.js";
