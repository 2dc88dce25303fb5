import { createLogger, LogLevel, setDefaultLogger } from "../src/logger/index.js";

// Keep test output quiet; failures still surface at error level
setDefaultLogger(createLogger({ level: LogLevel.ERROR, enableConsole: true, enableFile: false }));
