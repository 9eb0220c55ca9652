import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LogFileWriter, LogLevel, createLogger, parseLogLevel } from "../src/logger/index.js";
import type { LogEntry } from "../src/logger/index.js";

describe("AppLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agent-desk-logs-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes entries at or above the configured level to per-level files", async () => {
    const logger = createLogger({ logDir: dir, level: LogLevel.INFO, enableConsole: false, enableFile: true });
    await logger.initialize();

    logger.debug("hidden");
    logger.info("hello", { agentId: "agent_alpha" });
    await logger.close();

    const paths = new LogFileWriter(dir);
    const info = readFileSync(paths.getLogFilePath(LogLevel.INFO), "utf8");
    expect(info).toMatch(/^\[[^\]]+\] INFO {2}hello \{"agentId":"agent_alpha"\}\n$/);
    expect(existsSync(paths.getLogFilePath(LogLevel.DEBUG))).toBe(false);
  });

  it("merges child bindings into the context", async () => {
    const logger = createLogger({ logDir: dir, level: LogLevel.DEBUG, enableConsole: false, enableFile: true });
    await logger.initialize();

    logger.child({ agentId: "agent_alpha" }).warn("careful", { userId: "user_1" });
    await logger.close();

    const warn = readFileSync(new LogFileWriter(dir).getLogFilePath(LogLevel.WARN), "utf8");
    expect(warn).toContain('WARN  careful {"agentId":"agent_alpha","userId":"user_1"}');
  });

  it("includes the error message and stack", async () => {
    const logger = createLogger({ logDir: dir, level: LogLevel.INFO, enableConsole: false, enableFile: true });
    await logger.initialize();

    logger.error("Provider call failed", new Error("boom"));
    await logger.close();

    const error = readFileSync(new LogFileWriter(dir).getLogFilePath(LogLevel.ERROR), "utf8");
    expect(error).toContain("ERROR Provider call failed\nError: boom\nStack: Error: boom");
  });
});

describe("LogFileWriter rotation", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agent-desk-rotate-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const entry = (message: string): LogEntry => ({
    timestamp: new Date("2024-05-01T00:00:00.000Z"),
    level: LogLevel.INFO,
    message,
  });

  it("rotates past maxFileSize and keeps maxFiles copies", async () => {
    const writer = new LogFileWriter(dir, { maxFileSize: 100, maxFiles: 2 });
    await writer.initialize();

    // Each line is 94 bytes, so every write after the first rotates
    for (const digit of ["1", "2", "3", "4"]) {
      await writer.write(entry(digit.repeat(60)));
    }
    await writer.close();

    const file = join(dir, "info-2024-05-01.log");
    expect(readFileSync(file, "utf8")).toContain("4".repeat(60));
    expect(readFileSync(`${file}.1`, "utf8")).toContain("3".repeat(60));
    expect(readFileSync(`${file}.2`, "utf8")).toContain("2".repeat(60));
    expect(existsSync(`${file}.3`)).toBe(false);
  });

  it("ignores writes before initialization", async () => {
    const writer = new LogFileWriter(dir);
    await writer.write(entry("early"));
    expect(existsSync(join(dir, "info-2024-05-01.log"))).toBe(false);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(parseLogLevel("WARN")).toBe(LogLevel.WARN);
  });

  it("falls back for unknown values", () => {
    expect(parseLogLevel("verbose")).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
