import { toPlainContext } from './context.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  category: string;
  context?: Record<string, unknown>;
  level: LogLevel;
  msg: string;
  timestamp: Date;
}

export interface Sink {
  flush(): void;
  write(entry: LogEntry): void;
}

export interface Logger {
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  isLevelEnabled(level: LogLevel): boolean;
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

let activeConfig: { level: LogLevel; sinks: Sink[] } = {
  level: 'info',
  sinks: [],
};

const loggers = new Map<string, Logger>();

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('trace', msgOrObj, msg);
  }

  debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('debug', msgOrObj, msg);
  }

  info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('info', msgOrObj, msg);
  }

  warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('warn', msgOrObj, msg);
  }

  error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('error', msgOrObj, msg);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return activeConfig.sinks.length > 0 && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(activeConfig.level);
  }

  private emit(level: LogLevel, msgOrObj: string | Record<string, unknown>, msg?: string): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { category: this.category, level, msg: msgOrObj, timestamp: new Date() }
        : {
            category: this.category,
            context: toPlainContext(msgOrObj),
            level,
            msg: msg ?? '',
            timestamp: new Date(),
          };

    for (const sink of activeConfig.sinks) {
      sink.write(entry);
    }
  }
}

/**
 * Replace the global logger configuration. Loggers obtained earlier keep
 * working and pick up the new level and sinks.
 */
export function initLogger(config: LoggerConfig): void {
  activeConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  const cached = loggers.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  loggers.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of activeConfig.sinks) {
    sink.flush();
  }
}
