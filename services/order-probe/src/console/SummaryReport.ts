/**
 * Console rendering of the end-of-run latency summary.
 */

import chalk from 'chalk';
import {
  type Distribution,
  type LatencySummary,
  METRIC_LABELS,
  type MetricName,
} from '../latency/SummaryStatistics';
import { OPERATION_KINDS } from '../types';

const RULE = '='.repeat(20);
const LABEL_WIDTH = 32;

function formatUs(value: number): string {
  return `${value.toFixed(1)} µs`;
}

export function formatDistribution(label: string, distribution: Distribution): string {
  const name = label.padEnd(LABEL_WIDTH);
  if (!distribution.stats) {
    return `${name}${chalk.dim('no data')}`;
  }
  const { min, median, p90, p99, max } = distribution.stats;
  return (
    `${name}count: ${String(distribution.count).padStart(6)}` +
    `   min: ${formatUs(min)}` +
    `   median: ${formatUs(median)}` +
    `   p90: ${formatUs(p90)}` +
    `   p99: ${chalk.yellow(formatUs(p99))}` +
    `   max: ${formatUs(max)}`
  );
}

export function formatSummary(summary: LatencySummary): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`${RULE} LATENCY SUMMARY ${RULE}`));
  lines.push(`samples: ${summary.sampleCount}`);
  lines.push('');

  const metricOrder: MetricName[] = ['rtt', 'tickToSend', 'tickToAck', 'usDiff', 'ackToAck'];
  for (const metric of metricOrder) {
    lines.push(formatDistribution(METRIC_LABELS[metric], summary.metrics[metric]));
  }

  lines.push('');
  for (const operation of OPERATION_KINDS) {
    lines.push(formatDistribution(`RTT ${operation}`, summary.rttByOperation[operation]));
  }

  lines.push(chalk.bold('='.repeat(RULE.length * 2 + ' LATENCY SUMMARY '.length)));
  return lines.join('\n');
}
