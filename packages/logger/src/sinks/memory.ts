import type { LogEntry, Sink } from '../logger.js';

/**
 * Keeps entries in memory. Used by tests to assert on what was logged.
 */
export class MemorySink implements Sink {
  private readonly received: LogEntry[] = [];

  get entries(): readonly LogEntry[] {
    return this.received;
  }

  write(entry: LogEntry): void {
    this.received.push(entry);
  }

  flush(): void {
    // nothing buffered
  }

  clear(): void {
    this.received.length = 0;
  }
}
