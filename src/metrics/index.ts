import { performance } from 'node:perf_hooks';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type HistogramSnapshot = Record<string, number>;

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type LogLevelSnapshot = {
  byLevel: CounterMap;
  byComponent: Record<string, CounterMap>;
  currentLevel: string;
  lastLevelChangeAt: string | null;
  levelChanges: CounterMap;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  counters: CounterMap;
  latencies: Record<string, LatencyStats>;
  histograms: Record<string, HistogramSnapshot>;
  logs: LogLevelSnapshot;
};

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [25, 50, 100, 250, 500, 1000, 2000, 5000, 10000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
  }
};

const COUNTER_HISTOGRAM: HistogramConfig = {
  buckets: [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
  }
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

class MetricsRegistry {
  private readonly counters = new Map<string, number>();
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByComponent = new Map<string, Map<string, number>>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.counters.clear();
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramConfigs.clear();
    this.logLevelCounters.clear();
    this.logLevelByComponent.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementCounter(name: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    this.counters.set(name, (this.counters.get(name) ?? 0) + amount);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  incrementLogLevel(level: string, context?: { message?: string; component?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.component) {
      const componentMap = this.logLevelByComponent.get(context.component) ?? new Map<string, number>();
      componentMap.set(normalized, (componentMap.get(normalized) ?? 0) + 1);
      this.logLevelByComponent.set(context.component, componentMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized === normalized) {
      return;
    }
    if (previousNormalized) {
      this.lastLogLevelChangeAt = Date.now();
      this.logLevelChangeCounters.set(
        normalized,
        (this.logLevelChangeCounters.get(normalized) ?? 0) + 1
      );
    }
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
    this.observeHistogram(metric, durationMs, DEFAULT_HISTOGRAM);
  }

  observeCount(metric: string, value: number) {
    this.observeHistogram(metric, value, COUNTER_HISTOGRAM);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  timeSync<T>(metric: string, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelMetrics(): LogLevelSnapshot {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      byComponent: mapFromNested(this.logLevelByComponent),
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: this.lastLogLevelChangeAt
        ? new Date(this.lastLogLevelChangeAt).toISOString()
        : null,
      levelChanges: mapFrom(this.logLevelChangeCounters),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      counters: mapFrom(this.counters),
      latencies: mapFromLatencies(this.latencyStats),
      histograms: mapFromHistograms(this.histograms),
      logs: this.exportLogLevelMetrics()
    };
  }

  private observeHistogram(metric: string, value: number, config: HistogramConfig) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    this.histogramConfigs.set(metric, histogramConfig);
    const histogram = this.histograms.get(metric) ?? new Map<string, number>();
    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
    this.histograms.set(metric, histogram);
  }
}

function orderedLogLevelEntries(source: Map<string, number>): Array<[string, number]> {
  const normalized = new Map(source);
  const ordered: Array<[string, number]> = [];
  for (const level of PINO_LEVEL_ORDER) {
    ordered.push([level, normalized.get(level) ?? 0]);
    normalized.delete(level);
  }

  const extras = Array.from(normalized.entries()).sort(([a], [b]) => a.localeCompare(b));
  return ordered.concat(extras);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  return Object.fromEntries(orderedLogLevelEntries(source));
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, inner] of ordered) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
      maxMs: stats.maxMs,
      averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count
    };
  }
  return result;
}

function mapFromHistograms(source: Map<string, Map<string, number>>): Record<string, HistogramSnapshot> {
  const result: Record<string, HistogramSnapshot> = {};
  for (const [metric, histogram] of source.entries()) {
    result[metric] = Object.fromEntries(
      Array.from(histogram.entries()).sort(([a], [b]) => compareHistogramKeys(a, b))
    );
  }
  return result;
}

function compareHistogramKeys(a: string, b: string) {
  const extract = (key: string) => {
    if (key.startsWith('<')) {
      return [parseFloat(key.slice(1)), -1] as const;
    }
    if (key.endsWith('+')) {
      return [parseFloat(key.slice(0, -1)), Number.POSITIVE_INFINITY] as const;
    }
    const [start, end] = key.split('-').map(Number);
    return [start, end ?? start] as const;
  };

  const [aStart, aEnd] = extract(a);
  const [bStart, bEnd] = extract(b);
  if (aStart === bStart) {
    return aEnd - bEnd;
  }
  return aStart - bStart;
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous = 0;
  for (const bucket of buckets) {
    if (value < bucket) {
      return format(bucket, previous === 0 ? undefined : previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

const defaultRegistry = new MetricsRegistry();

export type { HistogramSnapshot, LatencyStats, LogLevelSnapshot, MetricsSnapshot };
export { MetricsRegistry };
export default defaultRegistry;
