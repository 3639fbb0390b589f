/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Non-blocking: a failed flush keeps its events for the next attempt.
 * Acts as a no-op when apiToken is empty.
 */

import { BaseLogProvider, type BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions extends BaseLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
  /** Drop the oldest events beyond this many while Axiom is unreachable. Default: 5000. */
  maxBufferedEvents?: number;
  /** Static fields attached to every event, e.g. service name and environment. */
  baseFields?: Record<string, unknown>;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider extends BaseLogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly flushThreshold: number;
  private readonly maxBufferedEvents: number;
  private readonly baseFields: Record<string, unknown>;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly enabled: boolean;

  constructor(options: AxiomLogProviderOptions) {
    super(options);
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferedEvents = options.maxBufferedEvents ?? 5000;
    this.baseFields = options.baseFields ?? {};
    this.enabled = Boolean(this.apiToken);

    const flushIntervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  protected write(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push({ ...event, fields: { ...this.baseFields, ...event.fields } });
    if (this.buffer.length > this.maxBufferedEvents) {
      this.buffer.splice(0, this.buffer.length - this.maxBufferedEvents);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /** Concurrent callers share one in-flight request. */
  flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return Promise.resolve();
    if (!this.inFlight) {
      this.inFlight = this.send().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  private async send(): Promise<void> {
    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch.map(toAxiomEvent)),
      });

      if (response.ok) {
        // Only clear the events that were in this batch
        this.buffer.splice(0, batch.length);
      }
      // Non-ok response: retain events for retry on next flush
    } catch {
      // Network error: retain events for retry on next flush
    }
  }
}

/** Axiom indexes on `_time`; fields are flattened to top-level columns. */
function toAxiomEvent(event: LogEvent): Record<string, unknown> {
  const { fields, timestamp, ...rest } = event;
  return { _time: timestamp, ...rest, ...fields };
}
