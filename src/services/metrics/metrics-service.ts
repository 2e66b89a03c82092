/**
 * Metrics Service
 *
 * In-process counters and histograms for API call latency, drift checks
 * and detected drift, exportable as JSON or Prometheus text.
 */

/**
 * Histogram bucket upper bounds in seconds (Prometheus defaults)
 */
export const DEFAULT_BUCKETS: readonly number[] = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export type Labels = Record<string, string>;

export type MetricsExportFormat = 'json' | 'prometheus';

/**
 * Counter sample
 */
export interface CounterSample {
  labels: Labels;
  value: number;
}

/**
 * Histogram sample; `buckets[i]` counts observations <= `bounds[i]`
 */
export interface HistogramSample {
  labels: Labels;
  bounds: number[];
  buckets: number[];
  sum: number;
  count: number;
}

export interface MetricsSnapshot {
  counters: Record<string, { help: string; samples: CounterSample[] }>;
  histograms: Record<string, { help: string; samples: HistogramSample[] }>;
  timestamp: string;
}

export type ApiCallStatus = 'success' | 'error';

const METRIC_HELP: Record<string, string> = {
  infra_drift_api_calls_total: 'Total number of live-source API calls',
  infra_drift_api_latency_seconds: 'Latency of live-source API calls',
  infra_drift_checks_total: 'Total number of drift checks performed',
  infra_drift_check_latency_seconds: 'Latency of drift checks',
  infra_drift_detected_total: 'Total number of drifted attributes detected'
};

/**
 * Metrics Service Interface
 */
export interface IMetricsService {
  recordApiCall(api: string, status: ApiCallStatus, latencySeconds: number): void;
  recordDriftCheck(latencySeconds: number): void;
  recordDriftDetected(attribute: string): void;
  snapshot(): MetricsSnapshot;
  exportMetrics(format: MetricsExportFormat): string;
}

/**
 * Metrics Service Implementation
 */
export class MetricsService implements IMetricsService {
  private counters = new Map<string, Map<string, CounterSample>>();
  private histograms = new Map<string, Map<string, HistogramSample>>();
  private buckets: readonly number[];

  constructor(options: { buckets?: readonly number[] } = {}) {
    this.buckets = [...(options.buckets ?? DEFAULT_BUCKETS)].sort((a, b) => a - b);
  }

  recordApiCall(api: string, status: ApiCallStatus, latencySeconds: number): void {
    this.increment('infra_drift_api_calls_total', { api, status });
    this.observe('infra_drift_api_latency_seconds', { api }, latencySeconds);
  }

  recordDriftCheck(latencySeconds: number): void {
    this.increment('infra_drift_checks_total', {});
    this.observe('infra_drift_check_latency_seconds', {}, latencySeconds);
  }

  recordDriftDetected(attribute: string): void {
    this.increment('infra_drift_detected_total', { attribute });
  }

  /**
   * Current value of a counter series, 0 when never incremented
   */
  getCounter(name: string, labels: Labels = {}): number {
    return this.counters.get(name)?.get(labelKey(labels))?.value ?? 0;
  }

  /**
   * Current histogram series, if any observation was made
   */
  getHistogram(name: string, labels: Labels = {}): HistogramSample | undefined {
    return this.histograms.get(name)?.get(labelKey(labels));
  }

  increment(name: string, labels: Labels, by = 1): void {
    const series = getOrCreate(this.counters, name);
    const key = labelKey(labels);
    const sample = series.get(key);
    if (sample) {
      sample.value += by;
    } else {
      series.set(key, { labels: { ...labels }, value: by });
    }
  }

  observe(name: string, labels: Labels, value: number): void {
    const series = getOrCreate(this.histograms, name);
    const key = labelKey(labels);
    let sample = series.get(key);
    if (!sample) {
      sample = {
        labels: { ...labels },
        bounds: [...this.buckets],
        buckets: this.buckets.map(() => 0),
        sum: 0,
        count: 0
      };
      series.set(key, sample);
    }

    sample.sum += value;
    sample.count += 1;
    for (let i = 0; i < sample.bounds.length; i++) {
      if (value <= sample.bounds[i]) {
        sample.buckets[i] += 1;
      }
    }
  }

  snapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, series] of sortedEntries(this.counters)) {
      counters[name] = {
        help: METRIC_HELP[name] ?? name,
        samples: [...series.values()].map(s => ({ labels: { ...s.labels }, value: s.value }))
      };
    }

    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, series] of sortedEntries(this.histograms)) {
      histograms[name] = {
        help: METRIC_HELP[name] ?? name,
        samples: [...series.values()].map(s => ({
          labels: { ...s.labels },
          bounds: [...s.bounds],
          buckets: [...s.buckets],
          sum: s.sum,
          count: s.count
        }))
      };
    }

    return { counters, histograms, timestamp: new Date().toISOString() };
  }

  exportMetrics(format: MetricsExportFormat): string {
    const snapshot = this.snapshot();
    if (format === 'json') {
      return JSON.stringify(snapshot, null, 2);
    }
    return toPrometheusText(snapshot);
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

/**
 * Renders a snapshot in the Prometheus text exposition format
 */
export function toPrometheusText(snapshot: MetricsSnapshot): string {
  const lines: string[] = [];

  for (const [name, metric] of Object.entries(snapshot.counters)) {
    lines.push(`# HELP ${name} ${metric.help}`);
    lines.push(`# TYPE ${name} counter`);
    for (const sample of metric.samples) {
      lines.push(`${name}${formatLabels(sample.labels)} ${sample.value}`);
    }
  }

  for (const [name, metric] of Object.entries(snapshot.histograms)) {
    lines.push(`# HELP ${name} ${metric.help}`);
    lines.push(`# TYPE ${name} histogram`);
    for (const sample of metric.samples) {
      sample.bounds.forEach((bound, i) => {
        lines.push(`${name}_bucket${formatLabels({ ...sample.labels, le: String(bound) })} ${sample.buckets[i]}`);
      });
      lines.push(`${name}_bucket${formatLabels({ ...sample.labels, le: '+Inf' })} ${sample.count}`);
      lines.push(`${name}_sum${formatLabels(sample.labels)} ${sample.sum}`);
      lines.push(`${name}_count${formatLabels(sample.labels)} ${sample.count}`);
    }
  }

  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

function formatLabels(labels: Labels): string {
  const keys = Object.keys(labels).sort();
  if (keys.length === 0) return '';
  const parts = keys.map(key => `${key}="${escapeLabel(labels[key])}"`);
  return `{${parts.join(',')}}`;
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function labelKey(labels: Labels): string {
  return JSON.stringify(Object.keys(labels).sort().map(key => [key, labels[key]]));
}

function getOrCreate<V>(map: Map<string, Map<string, V>>, name: string): Map<string, V> {
  let series = map.get(name);
  if (!series) {
    series = new Map();
    map.set(name, series);
  }
  return series;
}

function sortedEntries<V>(map: Map<string, V>): [string, V][] {
  return [...map.entries()].sort(([a], [b]) => a.localeCompare(b));
}
