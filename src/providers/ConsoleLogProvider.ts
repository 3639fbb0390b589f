/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally writes to stdout.
 */

import { BaseLogProvider, type BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent } from './ILogProvider.js';

export interface ConsoleLogProviderOptions extends BaseLogProviderOptions {
  /** Write events to console.log as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Keep at most this many events in the buffer. Default: 1000. */
  maxBufferedEvents?: number;
}

export class ConsoleLogProvider extends BaseLogProvider {
  /** Inspectable buffer of logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly maxBufferedEvents: number;

  constructor(options?: ConsoleLogProviderOptions) {
    super(options);
    this.outputToConsole = options?.outputToConsole ?? false;
    this.maxBufferedEvents = options?.maxBufferedEvents ?? 1000;
  }

  protected write(event: LogEvent): void {
    this.events.push(event);
    if (this.events.length > this.maxBufferedEvents) {
      this.events.splice(0, this.events.length - this.maxBufferedEvents);
    }

    if (this.outputToConsole) {
      const prefix = `[${event.level.toUpperCase()}]`;
      const fieldsStr = event.fields ? ` ${JSON.stringify(event.fields)}` : '';
      console.log(`${prefix} ${event.message}${fieldsStr}`);
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
