export {
  initLogger,
  getLogger,
  flushLoggers,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { loadLoggerConfig, initLoggerFromEnv, loggerEnvSchema, type LoggerEnvConfig } from './config.js';
export { ConsoleSink, formatEntry, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
