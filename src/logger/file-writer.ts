import { appendFile, mkdir } from "fs/promises";
import { join } from "path";
import type { LogEntry, LogLevel } from "./types.js";

// ============================================
// FILE WRITER FOR LOGS
// ============================================
export class LogFileWriter {
  private logDir: string;
  private initialized: boolean = false;

  constructor(logDir: string) {
    this.logDir = logDir;
  }

  async initialize(): Promise<void> {
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  /**
   * One file per level and day: `<level>-YYYY-MM-DD.log`
   */
  private getLogFilePath(level: LogLevel, timestamp: Date): string {
    const date = timestamp.toISOString().split("T")[0];
    return join(this.logDir, `${level}-${date}.log`);
  }

  private formatLogEntry(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const errorStr = entry.error
      ? `\nError: ${entry.error.message}\nStack: ${entry.error.stack}`
      : "";

    return `[${timestamp}] ${level} ${entry.message}${contextStr}${errorStr}\n`;
  }

  /**
   * Append an entry. appendFile opens and closes the file on every write,
   * so no handle outlives the call.
   */
  async write(entry: LogEntry): Promise<void> {
    if (!this.initialized) {
      return;
    }

    await appendFile(this.getLogFilePath(entry.level, entry.timestamp), this.formatLogEntry(entry), "utf8");
  }

  async close(): Promise<void> {
    this.initialized = false;
  }
}
