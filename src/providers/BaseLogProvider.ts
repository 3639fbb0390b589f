/**
 * Shared plumbing for log sinks: level filtering, timestamps, bound fields
 * and the convenience methods. Subclasses only implement `write`.
 */

import { LOG_LEVEL_ORDER } from './ILogProvider.js';
import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

export interface BaseLogProviderOptions {
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
}

export abstract class BaseLogProvider implements ILogProvider {
  protected readonly minLevel: LogLevel;

  constructor(options?: BaseLogProviderOptions) {
    this.minLevel = options?.minLevel ?? 'debug';
  }

  /** Deliver an event that already passed the level filter. */
  protected abstract write(event: LogEvent): void;

  abstract flush(): Promise<void>;

  log(event: LogEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    this.write({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    });
  }

  child(fields: Record<string, unknown>): ILogProvider {
    return new BoundLogProvider(this, fields);
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
}

class BoundLogProvider extends BaseLogProvider {
  constructor(
    private readonly parent: ILogProvider,
    private readonly bound: Record<string, unknown>
  ) {
    super();
  }

  protected write(event: LogEvent): void {
    this.parent.log({ ...event, fields: { ...this.bound, ...event.fields } });
  }

  flush(): Promise<void> {
    return this.parent.flush();
  }
}
