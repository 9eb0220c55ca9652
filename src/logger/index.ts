// ============================================
// LOGGER MODULE EXPORTS
// ============================================
export { AppLogger, createLogger, getDefaultLogger, setDefaultLogger } from "./logger.js";
export { LogFileWriter } from "./file-writer.js";
export type { RotationOptions } from "./file-writer.js";
export { LogLevel, LOG_LEVELS, parseLogLevel } from "./types.js";
export type { Logger, LoggerConfig, LogEntry } from "./types.js";
