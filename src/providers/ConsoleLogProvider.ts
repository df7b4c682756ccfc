/**
 * Console-based log provider.
 * Buffers events in memory for inspection (tests read `events` directly).
 * Optionally writes each event to stderr as a single line.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface ConsoleLogProviderOptions {
  /** Write events to stderr as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
  }

  log(event: LogEvent): void {
    if (LEVEL_ORDER[event.level] < LEVEL_ORDER[this.minLevel]) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      const prefix = `[${stamped.level.toUpperCase()}]`;
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      // stdout is reserved for data; diagnostics go to stderr
      console.error(`${stamped.timestamp} ${prefix} ${stamped.message}${fieldsStr}`);
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Buffered events at exactly the given level. */
  at(level: LogLevel): LogEvent[] {
    return this.events.filter((event) => event.level === level);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
