import { LogLevel } from "./types.js";
import type { LogContext, LogEntry, Logger, LoggerConfig } from "./types.js";
import { LogFileWriter } from "./file-writer.js";

// ============================================
// STANDARDIZED LOGGER
// ============================================
const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized) ?? fallback;
}

export class AppLogger implements Logger {
  private config: LoggerConfig;
  private fileWriter: LogFileWriter;
  private bindings: LogContext;
  private initialized: boolean = false;

  constructor(config: LoggerConfig, bindings: LogContext = {}, fileWriter?: LogFileWriter) {
    this.config = config;
    this.bindings = bindings;
    this.fileWriter = fileWriter ?? new LogFileWriter(config.logDir);
  }

  /**
   * Create the log directory when file output is enabled.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.config.enableFile) {
      await this.fileWriter.initialize();
    }

    this.initialized = true;
  }

  /**
   * A logger sharing this one's outputs that adds `bindings` to every entry.
   */
  child(bindings: LogContext): AppLogger {
    const child = new AppLogger(this.config, { ...this.bindings, ...bindings }, this.fileWriter);
    child.initialized = this.initialized;
    return child;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  private formatConsoleLog(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context, null, 2)}` : "";
    const errorStr = entry.error
      ? `\nError: ${entry.error.message}${entry.error.stack ? `\n${entry.error.stack}` : ""}`
      : "";

    return `[${timestamp}] ${level} ${entry.message}${contextStr}${errorStr}`;
  }

  private mergeContext(context?: LogContext): LogContext | undefined {
    const hasBindings = Object.keys(this.bindings).length > 0;
    if (!hasBindings) return context;
    return { ...this.bindings, ...context };
  }

  private async log(level: LogLevel, message: string, error?: Error, context?: LogContext): Promise<void> {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      context: this.mergeContext(context),
      error,
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
      await this.fileWriter.write(entry);
    }
  }

  private dispatch(level: LogLevel, message: string, error?: Error, context?: LogContext): void {
    this.log(level, message, error, context).catch((writeError: unknown) => {
      const reason = writeError instanceof Error ? writeError.message : String(writeError);
      console.error(`Failed to write log entry "${message}": ${reason}`);
    });
  }

  debug(message: string, context?: LogContext): void {
    this.dispatch(LogLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: LogContext): void {
    this.dispatch(LogLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: LogContext): void {
    this.dispatch(LogLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.dispatch(LogLevel.ERROR, message, error, context);
  }

  async close(): Promise<void> {
    if (this.config.enableFile) {
      await this.fileWriter.close();
    }
    this.initialized = false;
  }
}

/**
 * Normalize anything thrown into an Error for `logger.error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
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
    enableFile: false,
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
