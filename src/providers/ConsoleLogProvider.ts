/**
 * Console-based log provider.
 * Keeps every event in memory for inspection (useful in tests) and, when
 * enabled, writes events at or above `minLevel` to stdout as JSON lines.
 */

import { LOG_LEVELS, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to stdout as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Lowest level written to stdout. Default: 'info'. */
  minLevel?: LogLevel;
  /** Static fields merged into every written line (e.g. service name). */
  baseFields?: Record<string, unknown>;
  /** Keep events in `events`. Default: true. Turn off for long-lived processes. */
  bufferEvents?: boolean;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minRank: number;
  private readonly baseFields: Record<string, unknown>;
  private readonly bufferEvents: boolean;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minRank = LOG_LEVELS.indexOf(options?.minLevel ?? 'info');
    this.baseFields = options?.baseFields ?? {};
    this.bufferEvents = options?.bufferEvents ?? true;
  }

  log(event: LogEvent): void {
    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    if (this.bufferEvents) this.events.push(stamped);

    if (this.outputToConsole && LOG_LEVELS.indexOf(stamped.level) >= this.minRank) {
      console.log(JSON.stringify(this.toLine(stamped)));
    }
  }

  async flush(): Promise<void> {
    // stdout writes are synchronous; nothing buffered for delivery.
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

  /** Events recorded at the given level. */
  eventsAt(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }

  private toLine(event: LogEvent): Record<string, unknown> {
    const { fields, ...rest } = event;
    return { ...this.baseFields, ...fields, ...rest };
  }
}
