/**
 * Logging Module
 * winston-backed logging shared by the pool, executor and transfer engine.
 * Console output goes to stderr so remote command output on stdout stays clean.
 */

import winston from "winston";
import path from "node:path";
import os from "node:os";
import fs from "node:fs";

export enum LogLevel {
  ERROR = "error",
  WARN = "warn",
  INFO = "info",
  DEBUG = "debug",
}

export interface LoggerConfig {
  level?: LogLevel;
  logToFile?: boolean;
  logDir?: string;
  logFileName?: string;
  maxFiles?: number;
  maxSize?: number;
  silent?: boolean;
}

/**
 * Overrides the configured level when set to one of the LogLevel values
 */
export const LOG_LEVEL_ENV = "SHELLFLEET_LOG_LEVEL";

const TIMESTAMP_FORMAT = "YYYY-MM-DD HH:mm:ss";

const getDefaultLogDir = (): string => path.join(os.homedir(), ".shellfleet", "logs");

const levelFromEnv = (): LogLevel | undefined =>
  Object.values(LogLevel).find((level) => level === process.env[LOG_LEVEL_ENV]);

/**
 * Errors passed as metadata lose their message under JSON.stringify; flatten them
 */
const normalizeMeta = (meta: unknown): Record<string, unknown> => {
  if (meta instanceof Error) {
    return { error: meta.message, ...(meta.stack ? { stack: meta.stack } : {}) };
  }
  if (typeof meta === "object" && meta !== null && !Array.isArray(meta)) {
    return Object.fromEntries(
      Object.entries(meta).map(([key, value]) => [key, value instanceof Error ? value.message : value])
    );
  }
  return meta === undefined ? {} : { meta };
};

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
  winston.format.printf(({ timestamp, level, message, scope, stack, ...meta }) => {
    const scopeStr = typeof scope === "string" ? ` ${scope}` : "";
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    const stackStr = typeof stack === "string" ? `\n${stack}` : "";
    return `${timestamp} [${level}]${scopeStr}: ${message}${metaStr}${stackStr}`;
  })
);

const fileFormat = winston.format.combine(winston.format.timestamp({ format: TIMESTAMP_FORMAT }), winston.format.json());

const createLogger = (config: LoggerConfig = {}): winston.Logger => {
  const {
    level = LogLevel.INFO,
    logToFile = false,
    logDir = getDefaultLogDir(),
    logFileName = "shellfleet.log",
    maxFiles = 7,
    maxSize = 10 * 1024 * 1024,
    silent = false,
  } = config;

  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: Object.values(LogLevel),
      format: consoleFormat,
    }),
  ];

  if (logToFile) {
    fs.mkdirSync(logDir, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, logFileName),
        maxsize: maxSize,
        maxFiles,
        format: fileFormat,
      }),
      new winston.transports.File({
        filename: path.join(logDir, "error.log"),
        level: LogLevel.ERROR,
        maxsize: maxSize,
        maxFiles,
        format: fileFormat,
      })
    );
  }

  return winston.createLogger({
    level: levelFromEnv() ?? level,
    silent,
    transports,
  });
};

let loggerInstance: winston.Logger | undefined;

/**
 * Replace the shared winston logger. Scoped loggers pick up the new one.
 */
export const initLogger = (config?: LoggerConfig): winston.Logger => {
  loggerInstance?.close();
  loggerInstance = createLogger(config);
  return loggerInstance;
};

export const getLogger = (): winston.Logger => {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
};

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

/**
 * Logger that tags every entry with `scope` (e.g. "pool", "transfer")
 */
export const createScopedLogger = (scope?: string): Logger => {
  const write = (level: LogLevel, message: string, meta: unknown): void => {
    const fields = normalizeMeta(meta);
    getLogger().log(level, message, scope ? { scope, ...fields } : fields);
  };

  return {
    error: (message, meta) => write(LogLevel.ERROR, message, meta),
    warn: (message, meta) => write(LogLevel.WARN, message, meta),
    info: (message, meta) => write(LogLevel.INFO, message, meta),
    debug: (message, meta) => write(LogLevel.DEBUG, message, meta),
  };
};

/**
 * Unscoped default logger
 */
export const logger: Logger = createScopedLogger();
