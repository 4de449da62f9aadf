import { performance } from 'node:perf_hooks';

export const METRIC_PREFIX = 'gridbox';

/** Bucket bounds are inclusive upper limits, as in Prometheus `le` buckets. */
const LATENCY_BOUNDS_MS: readonly number[] = [1, 5, 10, 25, 50, 100, 250, 500, 1000];
const COUNT_BOUNDS: readonly number[] = [0, 1, 2, 5, 10, 25, 50, 100, 250, 500, 1000];
const OVERFLOW_BUCKET = '+Inf';

type CounterMap = Record<string, number>;

export type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

/** Observations per bucket keyed by the bucket's upper bound; empty buckets are omitted. */
export type HistogramSnapshot = Record<string, number>;

export type DetectorSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    byDetector: Record<string, CounterMap>;
    currentLevel: string;
    levelChanges: CounterMap;
  };
  detectors: Record<string, DetectorSnapshot>;
  latencies: Record<string, LatencyStats>;
  histograms: Record<string, HistogramSnapshot>;
};

type DetectorState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
};

type Sample = {
  labels: Record<string, string>;
  value: number;
};

class Histogram {
  private readonly counts: number[];
  private sum = 0;
  private total = 0;

  constructor(private readonly bounds: readonly number[]) {
    this.counts = new Array<number>(bounds.length + 1).fill(0);
  }

  observe(value: number) {
    const index = this.bounds.findIndex(bound => value <= bound);
    this.counts[index === -1 ? this.bounds.length : index] += 1;
    this.sum += value;
    this.total += 1;
  }

  snapshot(): HistogramSnapshot {
    const snapshot: HistogramSnapshot = {};
    this.counts.forEach((count, index) => {
      if (count > 0) {
        snapshot[this.label(index)] = count;
      }
    });
    return snapshot;
  }

  toPrometheus(name: string): string[] {
    const lines = [`# TYPE ${name} histogram`];
    let cumulative = 0;
    this.counts.forEach((count, index) => {
      cumulative += count;
      lines.push(`${name}_bucket${formatLabels({ le: this.label(index) })} ${cumulative}`);
    });
    lines.push(`${name}_sum ${formatValue(this.sum)}`);
    lines.push(`${name}_count ${this.total}`);
    return lines;
  }

  private label(index: number) {
    return index < this.bounds.length ? String(this.bounds[index]) : OVERFLOW_BUCKET;
  }
}

export class MetricsRegistry {
  private readonly logEvents = new Map<string, number>();
  private readonly logEventsByDetector = new Map<string, Map<string, number>>();
  private readonly logLevelChanges = new Map<string, number>();
  private logLevel = 'info';
  private readonly detectors = new Map<string, DetectorState>();
  private readonly latencies = new Map<string, Omit<LatencyStats, 'averageMs'>>();
  private readonly histograms = new Map<string, Histogram>();
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logEvents.clear();
    this.logEventsByDetector.clear();
    this.logLevelChanges.clear();
    this.logLevel = 'info';
    this.detectors.clear();
    this.latencies.clear();
    this.histograms.clear();
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

  recordLogEvent(level: string, detector?: string) {
    increment(this.logEvents, level);
    if (detector) {
      const perDetector = this.logEventsByDetector.get(detector) ?? new Map<string, number>();
      increment(perDetector, level);
      this.logEventsByDetector.set(detector, perDetector);
    }
  }

  /** Sets the active level; a change from a different `previous` level is counted. */
  recordLogLevelChange(level: string, previous: string | null = null) {
    this.logLevel = level;
    if (previous !== null && previous !== level) {
      increment(this.logLevelChanges, level);
    }
  }

  incrementDetectorCounter(detector: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = this.detectorState(detector);
    increment(state.counters, counter, amount);
    state.lastRunAt = Date.now();
  }

  setDetectorGauge(detector: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = this.detectorState(detector);
    state.gauges.set(gauge, value);
    state.lastRunAt = Date.now();
  }

  recordDetectorError(detector: string, message: string) {
    const state = this.detectorState(detector);
    increment(state.counters, 'errors');
    state.lastRunAt = Date.now();
    state.lastErrorAt = state.lastRunAt;
    state.lastErrorMessage = message;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencies.get(metric);
    this.latencies.set(metric, {
      count: (current?.count ?? 0) + 1,
      totalMs: (current?.totalMs ?? 0) + durationMs,
      minMs: Math.min(current?.minMs ?? durationMs, durationMs),
      maxMs: Math.max(current?.maxMs ?? durationMs, durationMs)
    });
    this.histogram(metric, LATENCY_BOUNDS_MS).observe(durationMs);
  }

  observeCount(metric: string, value: number) {
    if (Number.isFinite(value)) {
      this.histogram(metric, COUNT_BOUNDS).observe(value);
    }
  }

  /** Runs `fn` synchronously and records its duration under `metric`. */
  time<T>(metric: string, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  snapshot(): MetricsSnapshot {
    const byDetector: Record<string, CounterMap> = {};
    for (const [detector, levels] of this.logEventsByDetector) {
      byDetector[detector] = sortedRecord(levels);
    }

    const detectors: Record<string, DetectorSnapshot> = {};
    for (const [detector, state] of this.detectors) {
      detectors[detector] = {
        counters: sortedRecord(state.counters),
        gauges: sortedRecord(state.gauges),
        lastRunAt: toIso(state.lastRunAt),
        lastErrorAt: toIso(state.lastErrorAt),
        lastErrorMessage: state.lastErrorMessage
      };
    }

    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencies) {
      latencies[metric] = { ...stats, averageMs: stats.totalMs / stats.count };
    }

    const histograms: Record<string, HistogramSnapshot> = {};
    for (const [metric, histogram] of this.histograms) {
      histograms[metric] = histogram.snapshot();
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: sortedRecord(this.logEvents),
        byDetector,
        currentLevel: this.logLevel,
        levelChanges: sortedRecord(this.logLevelChanges)
      },
      detectors,
      latencies,
      histograms
    };
  }

  /** Prometheus text exposition of every metric in the registry. */
  exportPrometheus(): string {
    const lines: string[] = [];

    pushSamples(
      lines,
      `${METRIC_PREFIX}_log_events_total`,
      'counter',
      'Log events grouped by level',
      Array.from(this.logEvents, ([level, value]) => ({ labels: { level }, value }))
    );
    pushSamples(lines, `${METRIC_PREFIX}_log_level_state`, 'gauge', 'Active log level', [
      { labels: { level: this.logLevel }, value: 1 }
    ]);

    const counters: Sample[] = [];
    const gauges: Sample[] = [];
    for (const [detector, state] of this.detectors) {
      for (const [counter, value] of state.counters) {
        counters.push({ labels: { detector, counter }, value });
      }
      for (const [gauge, value] of state.gauges) {
        gauges.push({ labels: { detector, gauge }, value });
      }
    }
    pushSamples(
      lines,
      `${METRIC_PREFIX}_detector_counter_total`,
      'counter',
      'Detector counters grouped by detector and counter',
      counters
    );
    pushSamples(
      lines,
      `${METRIC_PREFIX}_detector_gauge`,
      'gauge',
      'Last detector gauge values grouped by detector and gauge',
      gauges
    );

    for (const metric of Array.from(this.histograms.keys()).sort()) {
      const histogram = this.histograms.get(metric);
      if (histogram) {
        lines.push(...histogram.toPrometheus(metricName(metric)));
      }
    }

    return lines.join('\n');
  }

  private detectorState(detector: string): DetectorState {
    const existing = this.detectors.get(detector);
    if (existing) {
      return existing;
    }
    const created: DetectorState = {
      counters: new Map(),
      gauges: new Map(),
      lastRunAt: null,
      lastErrorAt: null,
      lastErrorMessage: null
    };
    this.detectors.set(detector, created);
    return created;
  }

  private histogram(metric: string, bounds: readonly number[]) {
    const existing = this.histograms.get(metric);
    if (existing) {
      return existing;
    }
    const created = new Histogram(bounds);
    this.histograms.set(metric, created);
    return created;
  }
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function sortedRecord(map: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(map).sort(([a], [b]) => a.localeCompare(b)));
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

function pushSamples(lines: string[], name: string, type: 'counter' | 'gauge', help: string, samples: Sample[]) {
  if (samples.length === 0) {
    return;
  }
  lines.push(`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`);
  const rendered = samples.map(sample => `${name}${formatLabels(sample.labels)} ${formatValue(sample.value)}`);
  lines.push(...rendered.sort());
}

function metricName(key: string) {
  return `${METRIC_PREFIX}_${key.replace(/[^A-Za-z0-9_]+/g, '_')}`;
}

function formatLabels(labels: Record<string, string>) {
  const pairs = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}="${value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"')}"`);
  return `{${pairs.join(',')}}`;
}

function formatValue(value: number) {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
}

const metrics = new MetricsRegistry();

export default metrics;
