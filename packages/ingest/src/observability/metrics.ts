import type { Logger } from '@workspace/logger';

type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  durations: Record<string, DurationSummary>;
  elapsedMs: number;
};

type DurationTotals = {
  count: number;
  min: number;
  max: number;
  total: number;
};

function summarize(totals: DurationTotals): DurationSummary {
  return {
    count: totals.count,
    min: totals.min,
    max: totals.max,
    avg: totals.count > 0 ? Math.round(totals.total / totals.count) : 0,
    total: totals.total,
  };
}

/**
 * Run counters (`tasks.persisted`, `errors.transient`, ...), gauges for the
 * queue and credential pool, and call durations grouped by operation.
 */
export class IngestMetrics {
  private readonly counters: Map<string, number>;
  private readonly gauges: Map<string, number>;
  private readonly durations: Map<string, DurationTotals>;
  private readonly now: () => number;
  private startedAt: number;

  constructor(now: () => number = Date.now) {
    this.counters = new Map();
    this.gauges = new Map();
    this.durations = new Map();
    this.now = now;
    this.startedAt = now();
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordDuration(operation: string, ms: number): void {
    // Running aggregates only; no per-call history is kept
    const totals = this.durations.get(operation);
    if (totals) {
      totals.count += 1;
      totals.total += ms;
      totals.min = Math.min(totals.min, ms);
      totals.max = Math.max(totals.max, ms);
    } else {
      this.durations.set(operation, { count: 1, min: ms, max: ms, total: ms });
    }
  }

  async time<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const startTime = performance.now();
    try {
      return await call();
    } finally {
      this.recordDuration(operation, Math.round(performance.now() - startTime));
    }
  }

  snapshot(): MetricSnapshot {
    const durations: Record<string, DurationSummary> = {};
    for (const [operation, totals] of this.durations) {
      durations[operation] = summarize(totals);
    }

    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      durations,
      elapsedMs: this.now() - this.startedAt,
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('Run metrics', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.durations.clear();
    this.startedAt = this.now();
  }
}

export type { DurationSummary, MetricSnapshot };
