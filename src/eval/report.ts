/**
 * Report Rendering
 *
 * Plain-text renderings of reports and comparisons, for callers that print
 * or attach them somewhere. Nothing here writes output itself.
 */

import { formatTable, type Column, type Row } from '../utils/table.js';
import { AGGREGATE_METRIC_NAMES } from './aggregator.js';
import type {
  AggregateMetricName,
  MetricDirection,
  MetricsReport,
  ReportComparison,
} from './types.js';

/**
 * Map metric keys to display names.
 */
export function formatMetricName(metric: AggregateMetricName): string {
  const labels: Record<AggregateMetricName, string> = {
    map: 'MAP',
    mrr: 'MRR',
    ndcg: 'nDCG',
    precision: 'Precision',
    recall: 'Recall',
    f1: 'F1',
    hit_rate: 'Hit Rate',
  };
  return labels[metric];
}

function arrow(direction: MetricDirection): string {
  return direction === 'up' ? '↑' : direction === 'down' ? '↓' : '→';
}

function signed(delta: number): string {
  return (delta >= 0 ? '+' : '') + delta.toFixed(3);
}

/**
 * Render a report as a header plus a metric/value table.
 *
 * @example
 * formatReport(report)
 * // Retrieval Metrics Report
 * // ========================
 * // Queries: 2
 * // Cutoff:  k=3
 * //
 * // ┌───────────┬───────┐
 * // │ Metric    │ Value │
 * // ...
 */
export function formatReport(report: MetricsReport): string {
  const columns: Column[] = [
    { header: 'Metric', key: 'metric' },
    { header: 'Value', key: 'value' },
  ];
  const rows: Row[] = AGGREGATE_METRIC_NAMES.map((name) => ({
    metric: formatMetricName(name),
    value: report.aggregate[name],
  }));

  return [
    'Retrieval Metrics Report',
    '========================',
    `Queries: ${report.queryCount}`,
    `Cutoff:  k=${report.k}`,
    '',
    formatTable(columns, rows),
  ].join('\n');
}

/**
 * Render a comparison as a table with trend arrows (↑↓→), followed by
 * regression and improvement lines.
 */
export function formatComparison(comparison: ReportComparison): string {
  const columns: Column[] = [
    { header: 'Metric', key: 'metric' },
    { header: 'Current', key: 'current' },
    { header: 'Previous', key: 'previous' },
    { header: 'Change', key: 'change', align: 'right' },
    { header: 'Trend', key: 'trend', align: 'center' },
  ];
  const rows: Row[] = AGGREGATE_METRIC_NAMES.map((name) => {
    const m = comparison.metrics[name];
    return {
      metric: formatMetricName(name),
      current: m.current,
      previous: m.previous,
      change: signed(m.delta),
      trend: arrow(m.direction),
    };
  });

  const lines: string[] = [
    'Retrieval Metrics Comparison',
    '============================',
    `Cutoff:    k=${comparison.k}`,
    `Threshold: ±${comparison.threshold.toFixed(3)}`,
    '',
    formatTable(columns, rows),
    '',
  ];

  const regressions = AGGREGATE_METRIC_NAMES.filter((name) => comparison.metrics[name].isRegression);
  if (regressions.length > 0) {
    lines.push(`Regressions (${regressions.length}):`);
    for (const name of regressions) {
      const m = comparison.metrics[name];
      lines.push(
        `  ${formatMetricName(name)} dropped by ${Math.abs(m.delta).toFixed(3)} (${m.previous.toFixed(3)} -> ${m.current.toFixed(3)})`
      );
    }
  }

  const improvements = AGGREGATE_METRIC_NAMES.filter((name) => comparison.metrics[name].isImprovement);
  if (improvements.length > 0) {
    lines.push(`Improvements (${improvements.length}):`);
    for (const name of improvements) {
      const m = comparison.metrics[name];
      lines.push(
        `  ${formatMetricName(name)} improved by ${m.delta.toFixed(3)} (${m.previous.toFixed(3)} -> ${m.current.toFixed(3)})`
      );
    }
  }

  if (regressions.length === 0 && improvements.length === 0) {
    lines.push(`All metrics stable (no change beyond ±${comparison.threshold.toFixed(3)})`);
  }

  return lines.join('\n');
}
