import { LOG_LEVELS, LogLevel } from "./types.js";
import type { LogEntry, LoggerConfig, Logger } from "./types.js";
import { LogFileWriter } from "./file-writer.js";

// ============================================
// STANDARDIZED LOGGER
// ============================================
export class AppLogger implements Logger {
  private config: LoggerConfig;
  private fileWriter: LogFileWriter;
  private initialized: boolean = false;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.fileWriter = new LogFileWriter(config.logDir, {
      ...(config.maxFileSize !== undefined ? { maxFileSize: config.maxFileSize } : {}),
      ...(config.maxFiles !== undefined ? { maxFiles: config.maxFiles } : {}),
    });
  }

  /**
   * Initialize the logger (create log directory, etc.)
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.config.enableFile) {
      await this.fileWriter.initialize();
    }

    this.initialized = true;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.config.level);
  }

  /**
   * Format log entry for console output
   */
  private formatConsoleLog(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const errorStr = entry.error
      ? `\nError: ${entry.error.message}${entry.error.stack ? `\n${entry.error.stack}` : ""}`
      : "";

    return `[${timestamp}] ${level} ${entry.message}${contextStr}${errorStr}`;
  }

  /**
   * Write an entry to the console and, once initialized, to the level's log file.
   */
  write(level: LogLevel, message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
      ...(error ? { error } : {}),
    };

    if (this.config.enableConsole) {
      const consoleMessage = this.formatConsoleLog(entry);
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(consoleMessage);
          break;
        case LogLevel.INFO:
          console.info(consoleMessage);
          break;
        case LogLevel.WARN:
          console.warn(consoleMessage);
          break;
        case LogLevel.ERROR:
          console.error(consoleMessage);
          break;
      }
    }

    if (this.config.enableFile && this.initialized) {
      this.fileWriter.write(entry).catch((writeError: unknown) => {
        console.error(
          "Failed to write log to file:",
          writeError instanceof Error ? writeError.message : String(writeError)
        );
      });
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, error, context);
  }

  /**
   * Logger that prefixes every entry's context with `bindings`.
   */
  child(bindings: Record<string, unknown>): Logger {
    return new ChildLogger(this, bindings);
  }

  /**
   * Wait for pending file writes and stop writing to disk.
   */
  async close(): Promise<void> {
    if (this.config.enableFile) {
      await this.fileWriter.close();
    }
    this.initialized = false;
  }
}

class ChildLogger implements Logger {
  constructor(
    private parent: AppLogger,
    private bindings: Record<string, unknown>
  ) {}

  private merge(context?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.bindings, ...context };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.write(LogLevel.DEBUG, message, undefined, this.merge(context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.write(LogLevel.INFO, message, undefined, this.merge(context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.write(LogLevel.WARN, message, undefined, this.merge(context));
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.parent.write(LogLevel.ERROR, message, error, this.merge(context));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ChildLogger(this.parent, this.merge(bindings));
  }
}

// ============================================
// LOGGER FACTORY
// ============================================
let defaultLogger: AppLogger | null = null;

export function createLogger(config?: Partial<LoggerConfig>): AppLogger {
  const defaultConfig: LoggerConfig = {
    logDir: "logs",
    level: LogLevel.INFO,
    enableConsole: true,
    enableFile: true,
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
    ...config,
  };

  return new AppLogger(defaultConfig);
}

export function getDefaultLogger(): AppLogger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: AppLogger): void {
  defaultLogger = logger;
}
