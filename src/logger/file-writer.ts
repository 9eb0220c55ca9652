import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import type { LogEntry, LogLevel } from "./types.js";

export interface RotationOptions {
  maxFileSize: number;
  maxFiles: number;
}

const DEFAULT_ROTATION: RotationOptions = {
  maxFileSize: 10 * 1024 * 1024,
  maxFiles: 5,
};

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

// ============================================
// FILE WRITER FOR LOGS
// ============================================
export class LogFileWriter {
  private logDir: string;
  private rotation: RotationOptions;
  private initialized: boolean = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(logDir: string, rotation: Partial<RotationOptions> = {}) {
    this.logDir = logDir;
    this.rotation = { ...DEFAULT_ROTATION, ...rotation };
  }

  /**
   * Initialize log directory and ensure it exists
   */
  async initialize(): Promise<void> {
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  /**
   * One file per level and day, e.g. `error-2024-05-01.log`
   */
  getLogFilePath(level: LogLevel, date: Date = new Date()): string {
    const day = date.toISOString().split("T")[0];
    return join(this.logDir, `${level}-${day}.log`);
  }

  private formatLogEntry(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const errorStr = entry.error
      ? `\nError: ${entry.error.message}\nStack: ${entry.error.stack ?? ""}`
      : "";

    return `[${timestamp}] ${level} ${entry.message}${contextStr}${errorStr}\n`;
  }

  /**
   * Append an entry to its file. Writes are queued so rotation never races an append.
   */
  write(entry: LogEntry): Promise<void> {
    if (!this.initialized) {
      return Promise.resolve();
    }

    const filePath = this.getLogFilePath(entry.level, entry.timestamp);
    const logLine = this.formatLogEntry(entry);

    const next = this.queue.then(async () => {
      await this.rotateIfNeeded(filePath, Buffer.byteLength(logLine, "utf8"));
      await appendFile(filePath, logLine, "utf8");
    });
    // Keep the queue alive after a failed write; the caller still sees the rejection
    this.queue = next.catch(() => undefined);
    return next;
  }

  /**
   * Shift `file.log` → `file.log.1` → ... and drop the copy past maxFiles.
   */
  private async rotateIfNeeded(filePath: string, incomingBytes: number): Promise<void> {
    let size: number;
    try {
      size = (await stat(filePath)).size;
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }
    if (size + incomingBytes <= this.rotation.maxFileSize) return;

    await rm(`${filePath}.${this.rotation.maxFiles}`, { force: true });
    for (let index = this.rotation.maxFiles - 1; index >= 1; index--) {
      try {
        await rename(`${filePath}.${index}`, `${filePath}.${index + 1}`);
      } catch (error) {
        if (!isMissingFile(error)) throw error;
      }
    }
    await rename(filePath, `${filePath}.1`);
  }

  /**
   * Wait for queued writes, then stop accepting new ones.
   */
  async close(): Promise<void> {
    await this.queue;
    this.initialized = false;
  }
}
