/**
 * Console summary table
 */

import type { LevelSummary, MetricSummary } from '../types/index.js';

const HEADERS = ['Concurrency', 'Success Rate', 'Response Time (s)', 'Throughput (req/s)', 'Output Tokens/s'];

function formatMetric(metric: MetricSummary, digits: number): string {
  return `${metric.mean.toFixed(digits)} ± ${metric.stdDev.toFixed(digits)}`;
}

/**
 * Render one line per level, in sweep order
 */
export function formatSummaryTable(levels: readonly LevelSummary[]): string {
  const rows = levels.map((level) => [
    String(level.concurrency),
    level.error !== undefined ? 'failed' : `${(level.successRate.mean * 100).toFixed(1)}%`,
    formatMetric(level.avgResponseTime, 3),
    formatMetric(level.requestsPerSecond, 2),
    formatMetric(level.outputTokenThroughput, 1),
  ]);

  const widths = HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const renderRow = (cells: readonly string[]): string =>
    cells.map((cell, column) => cell.padEnd(widths[column] ?? cell.length)).join('  ').trimEnd();

  const lines = [
    renderRow(HEADERS),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map(renderRow),
  ];

  const failed = levels.filter((level) => level.error !== undefined);
  for (const level of failed) {
    lines.push(`c=${level.concurrency}: ${level.error ?? ''}`);
  }

  return lines.join('\n');
}
