/**
 * Rolling performance statistics over resolved queries.
 * Health is advisory only; nothing here changes routing.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { SnapshotWindow } from '../types/api.js';
import type {
  ErrorKind,
  LatencyPercentiles,
  PerformanceSnapshot,
  QueryOutcome,
  Tier,
} from '../types/models.js';

export interface QuerySample {
  queryId: string;
  at: Date;
  tier: Tier;
  latencyMs: number;
  lowConfidence: boolean;
  errorKinds: ErrorKind[];
  outcome: QueryOutcome;
}

export interface PerformanceMonitorOptions {
  successRateFloor: number;
  /** Oldest samples are dropped beyond this many. */
  maxSamples: number;
}

/** Nearest-rank percentile of an ascending array; 0 when empty. */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.max(1, Math.ceil((p / 100) * sorted.length));
  return sorted[Math.min(rank, sorted.length) - 1] ?? 0;
}

export class PerformanceMonitor {
  private readonly samples: QuerySample[] = [];
  private readonly byId = new Map<string, QuerySample>();

  constructor(
    private readonly options: PerformanceMonitorOptions,
    private readonly logger: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(sample: Omit<QuerySample, 'outcome'>): void {
    const full: QuerySample = { ...sample, errorKinds: [...sample.errorKinds], outcome: 'pending' };
    this.samples.push(full);
    this.byId.set(full.queryId, full);

    while (this.samples.length > this.options.maxSamples) {
      const dropped = this.samples.shift();
      if (dropped) this.byId.delete(dropped.queryId);
    }
  }

  /** Decide a pending sample. Returns false for unknown or already-decided queries. */
  recordOutcome(
    queryId: string,
    outcome: Exclude<QueryOutcome, 'pending'>,
    cause?: ErrorKind
  ): boolean {
    const sample = this.byId.get(queryId);
    if (!sample || sample.outcome !== 'pending') return false;
    sample.outcome = outcome;
    if (cause) sample.errorKinds.push(cause);
    return true;
  }

  get sampleCount(): number {
    return this.samples.length;
  }

  snapshot(window: SnapshotWindow): PerformanceSnapshot {
    const windowEnd = 'lastMs' in window ? this.now() : window.to;
    const windowStart =
      'lastMs' in window ? new Date(windowEnd.getTime() - window.lastMs) : window.from;

    const inWindow = this.samples.filter(
      (s) => s.at.getTime() >= windowStart.getTime() && s.at.getTime() <= windowEnd.getTime()
    );

    let successes = 0;
    let decided = 0;
    let lowConfidence = 0;
    const errorKinds: Partial<Record<ErrorKind, number>> = {};
    const tierUsage: Record<Tier, number> = { cache: 0, specialized: 0, general: 0 };

    for (const s of inWindow) {
      if (s.outcome !== 'pending') decided++;
      if (s.outcome === 'success') successes++;
      if (s.lowConfidence) lowConfidence++;
      tierUsage[s.tier]++;
      for (const kind of s.errorKinds) {
        errorKinds[kind] = (errorKinds[kind] ?? 0) + 1;
      }
    }

    const successRate = decided === 0 ? null : successes / decided;
    const health =
      successRate !== null && successRate < this.options.successRateFloor
        ? 'needs_attention'
        : 'healthy';

    if (health === 'needs_attention') {
      this.logger.warn('Success rate below floor', {
        successRate,
        floor: this.options.successRateFloor,
        decided,
      });
    }

    return {
      windowStart,
      windowEnd,
      totalQueries: inWindow.length,
      decidedQueries: decided,
      successRate,
      latency: latencyPercentiles(inWindow.map((s) => s.latencyMs)),
      errorKinds,
      tierUsage,
      lowConfidenceRate: inWindow.length === 0 ? 0 : lowConfidence / inWindow.length,
      health,
    };
  }
}

function latencyPercentiles(latencies: number[]): LatencyPercentiles {
  const sorted = [...latencies].sort((a, b) => a - b);
  return {
    p50: percentile(sorted, 50),
    p90: percentile(sorted, 90),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}
