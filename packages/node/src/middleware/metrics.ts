/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format — no prom-client dependency.
 * Collects:
 * - http_requests_total (counter, by method + status + route)
 * - http_request_duration_seconds (histogram, by method + route)
 * - named business counters such as aliaspay_payments_total{type,outcome}
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

export const PAYMENTS_COUNTER = "aliaspay_payments_total";
export const ALIAS_REGISTRATIONS_COUNTER = "aliaspay_alias_registrations_total";

const COUNTER_HELP: Readonly<Record<string, string>> = {
  [PAYMENTS_COUNTER]: "Payment dispatches by payment type and outcome",
  [ALIAS_REGISTRATIONS_COUNTER]: "Alias registration attempts by outcome",
};

interface RequestCounter {
  readonly method: string;
  readonly route: string;
  readonly status: number;
  count: number;
}

interface DurationHistogram {
  readonly method: string;
  readonly route: string;
  sum: number;
  count: number;
  /** le → cumulative count */
  readonly buckets: Map<number, number>;
}

interface LabelledCount {
  readonly labels: Readonly<Record<string, string>>;
  count: number;
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function labelsKey(labels: Readonly<Record<string, string>>): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function formatLabels(labels: Readonly<Record<string, string>>): string {
  const body = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${escapeLabel(v)}"`)
    .join(",");
  return body.length > 0 ? `{${body}}` : "";
}

export class MetricsCollector {
  private readonly _requests = new Map<string, RequestCounter>();
  private readonly _durations = new Map<string, DurationHistogram>();
  private readonly _counters = new Map<string, Map<string, LabelledCount>>();
  private readonly _buckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = buckets;
  }

  recordRequest(method: string, route: string, status: number, durationMs: number): void {
    const counterKey = `${method}:${route}:${status}`;
    const counter = this._requests.get(counterKey);
    if (counter !== undefined) {
      counter.count++;
    } else {
      this._requests.set(counterKey, { method, route, status, count: 1 });
    }

    const histKey = `${method}:${route}`;
    const seconds = durationMs / 1000;
    let hist = this._durations.get(histKey);
    if (hist === undefined) {
      hist = {
        method,
        route,
        sum: 0,
        count: 0,
        buckets: new Map(this._buckets.map((b) => [b, 0])),
      };
      this._durations.set(histKey, hist);
    }
    hist.sum += seconds;
    hist.count++;
    for (const le of this._buckets) {
      if (seconds <= le) {
        hist.buckets.set(le, (hist.buckets.get(le) ?? 0) + 1);
      }
    }
  }

  incrementCounter(name: string, labels: Readonly<Record<string, string>> = {}): void {
    let metric = this._counters.get(name);
    if (metric === undefined) {
      metric = new Map();
      this._counters.set(name, metric);
    }

    const key = labelsKey(labels);
    const entry = metric.get(key);
    if (entry !== undefined) {
      entry.count++;
    } else {
      metric.set(key, { labels: { ...labels }, count: 1 });
    }
  }

  /**
   * Current value of a named counter; 0 when never incremented.
   */
  counterValue(name: string, labels: Readonly<Record<string, string>> = {}): number {
    return this._counters.get(name)?.get(labelsKey(labels))?.count ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    lines.push("# HELP http_requests_total Total HTTP requests");
    lines.push("# TYPE http_requests_total counter");
    for (const entry of this._requests.values()) {
      lines.push(
        `http_requests_total${formatLabels({ method: entry.method, route: entry.route, status: String(entry.status) })} ${entry.count}`,
      );
    }

    lines.push("# HELP http_request_duration_seconds HTTP request duration in seconds");
    lines.push("# TYPE http_request_duration_seconds histogram");
    for (const hist of this._durations.values()) {
      const base = { method: hist.method, route: hist.route };
      for (const [le, count] of hist.buckets) {
        lines.push(
          `http_request_duration_seconds_bucket${formatLabels({ ...base, le: String(le) })} ${count}`,
        );
      }
      lines.push(
        `http_request_duration_seconds_bucket${formatLabels({ ...base, le: "+Inf" })} ${hist.count}`,
      );
      lines.push(`http_request_duration_seconds_sum${formatLabels(base)} ${hist.sum}`);
      lines.push(`http_request_duration_seconds_count${formatLabels(base)} ${hist.count}`);
    }

    for (const [name, entries] of this._counters) {
      lines.push(`# HELP ${name} ${COUNTER_HELP[name] ?? "Business metric counter"}`);
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, count } of entries.values()) {
        lines.push(`${name}${formatLabels(labels)} ${count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._requests.clear();
    this._durations.clear();
    this._counters.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Collapse path parameters so that every alias, address and hash does
 * not become its own time series.
 */
export function routeOf(path: string): string {
  return path
    .replace(/^\/alias\/(?!register$|search$)[^/]+$/, "/alias/:alias")
    .replace(/^\/address\/[^/]+\/alias$/, "/address/:address/alias")
    .replace(/^\/history\/[^/]+$/, "/history/:address")
    .replace(/^\/transaction\/[^/]+$/, "/transaction/:hash")
    .replace(/^\/subscriptions\/[^/]+$/, "/subscriptions/:param");
}

export function metricsMiddleware(collector: MetricsCollector): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    collector.recordRequest(c.req.method, routeOf(c.req.path), c.res.status, performance.now() - start);
  };
}
