import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  error: '\x1b[31m',
  info: '\x1b[32m',
  trace: '\x1b[90m',
  warn: '\x1b[33m',
};

/**
 * Writes each entry straight to the console.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
  }

  write(entry: LogEntry): void {
    const line = formatEntry(entry, this.color);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  flush(): void {
    // console writes are not buffered
  }
}

export function formatEntry(entry: LogEntry, color = false): string {
  const time = [entry.timestamp.getHours(), entry.timestamp.getMinutes(), entry.timestamp.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');

  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${LEVEL_COLORS[entry.level]}${label}\x1b[0m` : label;

  const context = entry.context
    ? ` {${Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ')}}`
    : '';

  return `[${time}] ${level} [${entry.category}] ${entry.msg}${context}`;
}
