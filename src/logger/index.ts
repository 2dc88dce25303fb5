// ============================================
// LOGGER MODULE EXPORTS
// ============================================
export {
  AppLogger,
  createLogger,
  getDefaultLogger,
  setDefaultLogger,
  parseLogLevel,
  toError,
} from "./logger.js";
export { LogFileWriter } from "./file-writer.js";
export { LogLevel } from "./types.js";
export type { Logger, LoggerConfig, LogEntry, LogContext } from "./types.js";
