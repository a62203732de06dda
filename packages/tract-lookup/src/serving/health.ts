/**
 * Health Monitoring Service
 *
 * Tracks lookup outcomes, latency percentiles and recent errors, and renders
 * them (with the catalog status) as JSON or Prometheus text.
 */

import type { ErrorMetrics, ErrorSample, HealthMetrics, QueryMetrics, ServiceStatus } from './types.js';

export type QueryOutcome = 'resolved' | 'not_found';

const MAX_LATENCIES = 10_000;
const MAX_ERRORS = 1000;
const ERROR_WINDOW_5M = 5 * 60 * 1000;
const ERROR_WINDOW_1H = 60 * 60 * 1000;

export class HealthMonitor {
  private startTime: number;
  private resolvedCount = 0;
  private notFoundCount = 0;
  private errorCount = 0;
  private latencies: number[] = [];
  private errors: ErrorSample[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  /**
   * Record a completed lookup
   */
  recordQuery(outcome: QueryOutcome, latencyMs: number): void {
    if (outcome === 'resolved') {
      this.resolvedCount++;
    } else {
      this.notFoundCount++;
    }

    this.latencies.push(latencyMs);
    if (this.latencies.length > MAX_LATENCIES) {
      this.latencies.shift();
    }
  }

  /**
   * Record a failed lookup or reload
   */
  recordError(error: string, lat?: number, lon?: number): void {
    this.errorCount++;
    this.errors.push({ timestamp: this.now(), error, lat, lon });

    if (this.errors.length > MAX_ERRORS) {
      this.errors.shift();
    }
  }

  getMetrics(catalog: ServiceStatus): HealthMetrics {
    const queries: QueryMetrics = {
      total: this.resolvedCount + this.notFoundCount + this.errorCount,
      resolved: this.resolvedCount,
      notFound: this.notFoundCount,
      failed: this.errorCount,
      latencyP50: this.calculatePercentile(0.5),
      latencyP95: this.calculatePercentile(0.95),
      latencyP99: this.calculatePercentile(0.99),
    };

    const errors: ErrorMetrics = {
      last5m: this.countErrorsInWindow(ERROR_WINDOW_5M),
      last1h: this.countErrorsInWindow(ERROR_WINDOW_1H),
      recentErrors: this.errors.slice(-10),
    };

    return {
      uptimeSeconds: (this.now() - this.startTime) / 1000,
      queries,
      errors,
      catalog,
    };
  }

  private calculatePercentile(p: number): number {
    if (this.latencies.length === 0) {
      return 0;
    }

    const sorted = [...this.latencies].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.max(0, index)];
  }

  private countErrorsInWindow(windowMs: number): number {
    const cutoff = this.now() - windowMs;
    return this.errors.filter((e) => e.timestamp >= cutoff).length;
  }

  /**
   * Export Prometheus-compatible metrics
   */
  exportPrometheus(catalog: ServiceStatus): string {
    const metrics = this.getMetrics(catalog);
    const lines: string[] = [];

    lines.push('# HELP tract_lookup_queries_total Lookup queries by outcome');
    lines.push('# TYPE tract_lookup_queries_total counter');
    lines.push(`tract_lookup_queries_total{outcome="resolved"} ${metrics.queries.resolved}`);
    lines.push(`tract_lookup_queries_total{outcome="not_found"} ${metrics.queries.notFound}`);
    lines.push(`tract_lookup_queries_total{outcome="error"} ${metrics.queries.failed}`);

    lines.push('# HELP tract_lookup_query_latency_seconds Query latency percentiles');
    lines.push('# TYPE tract_lookup_query_latency_seconds summary');
    lines.push(`tract_lookup_query_latency_seconds{quantile="0.5"} ${metrics.queries.latencyP50 / 1000}`);
    lines.push(`tract_lookup_query_latency_seconds{quantile="0.95"} ${metrics.queries.latencyP95 / 1000}`);
    lines.push(`tract_lookup_query_latency_seconds{quantile="0.99"} ${metrics.queries.latencyP99 / 1000}`);

    lines.push('# HELP tract_lookup_catalog_ready Whether a catalog is serving (1) or not (0)');
    lines.push('# TYPE tract_lookup_catalog_ready gauge');
    lines.push(`tract_lookup_catalog_ready ${catalog.ready ? 1 : 0}`);

    lines.push('# HELP tract_lookup_catalog_polygons Polygons in the serving catalog');
    lines.push('# TYPE tract_lookup_catalog_polygons gauge');
    lines.push(`tract_lookup_catalog_polygons ${catalog.polygonCount}`);

    lines.push('# HELP tract_lookup_catalog_generation Load generation of the serving catalog');
    lines.push('# TYPE tract_lookup_catalog_generation gauge');
    lines.push(`tract_lookup_catalog_generation ${catalog.generation ?? 0}`);

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (for testing)
   */
  reset(): void {
    this.startTime = this.now();
    this.resolvedCount = 0;
    this.notFoundCount = 0;
    this.errorCount = 0;
    this.latencies = [];
    this.errors = [];
  }
}
