export { config, defineConfig } from "./config.js";
export type { CorralConfig, CollectionsConfig, LogLevel } from "./config.js";

export { createLogger, currentLogLevel } from "./logger.js";
export type { Logger } from "./logger.js";
