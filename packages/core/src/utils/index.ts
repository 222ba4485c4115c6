/**
 * Utils Module - Utility functions and helpers
 */

export { logger, initLogger, getLogger, createScopedLogger, LogLevel, LOG_LEVEL_ENV } from "./logger.js";
export type { Logger, LoggerConfig } from "./logger.js";
export { Mutex } from "./mutex.js";
export type { Release } from "./mutex.js";
export { CompletionChannel } from "./channel.js";
export { shellQuote } from "./shell.js";
