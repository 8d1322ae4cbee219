/**
 * Metrics reporting.
 *
 * Handlers report one record per invocation: operation name, outcome and
 * elapsed time. The in-memory reporter aggregates them per operation for
 * the /metrics endpoint; a production sink implements the same interface.
 */

export type MetricOutcome = 'success' | 'failure';

export interface MetricsReporter {
  record(operation: string, outcome: MetricOutcome, durationMs: number): void;
}

export interface OperationMetrics {
  operation: string;
  success: number;
  failure: number;
  totalDurationMs: number;
  maxDurationMs: number;
}

export interface MetricsSnapshot {
  operations: OperationMetrics[];
}

export class MemoryMetricsReporter implements MetricsReporter {
  private series = new Map<string, OperationMetrics>();

  record(operation: string, outcome: MetricOutcome, durationMs: number): void {
    let metrics = this.series.get(operation);
    if (!metrics) {
      metrics = { operation, success: 0, failure: 0, totalDurationMs: 0, maxDurationMs: 0 };
      this.series.set(operation, metrics);
    }
    metrics[outcome] += 1;
    metrics.totalDurationMs += durationMs;
    metrics.maxDurationMs = Math.max(metrics.maxDurationMs, durationMs);
  }

  get(operation: string): OperationMetrics | undefined {
    const metrics = this.series.get(operation);
    return metrics ? { ...metrics } : undefined;
  }

  /** Operations sorted by name. */
  snapshot(): MetricsSnapshot {
    const operations = [...this.series.values()]
      .map((m) => ({ ...m }))
      .sort((a, b) => a.operation.localeCompare(b.operation));
    return { operations };
  }
}
