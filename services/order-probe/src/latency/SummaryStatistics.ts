/**
 * Summary Statistics
 *
 * Post-run distributions over the recorded samples. Percentiles use the
 * nearest-rank rule: sort ascending, take index ceil(p/100 * n) - 1, clamped to [0, n-1].
 * Samples whose call failed at the transport level carry no reply timing and are
 * left out of every distribution.
 */

import type { OperationKind, Sample } from '../types';

export type MetricName = 'rtt' | 'tickToSend' | 'tickToAck' | 'usDiff' | 'ackToAck';

export interface DistributionStats {
  min: number;
  median: number;
  p90: number;
  p99: number;
  max: number;
}

/**
 * `stats` is null when no value was observed; a missing measurement is never reported as zero.
 */
export interface Distribution {
  count: number;
  stats: DistributionStats | null;
}

export interface LatencySummary {
  sampleCount: number;
  metrics: Record<MetricName, Distribution>;
  rttByOperation: Record<OperationKind, Distribution>;
}

export const METRIC_LABELS: Record<MetricName, string> = {
  rtt: 'RTT (send -> ack)',
  tickToSend: 'Tick -> send',
  tickToAck: 'Tick -> ack',
  usDiff: 'Engine usOut - usIn',
  ackToAck: 'Ack interval (same operation)',
};

/**
 * Zero-based nearest-rank index for `percent` in [0, 100].
 */
export function nearestRankIndex(count: number, percent: number): number {
  const index = Math.ceil((percent * count) / 100) - 1;
  return Math.min(Math.max(index, 0), count - 1);
}

export function percentile(sorted: readonly number[], percent: number): number {
  if (sorted.length === 0) {
    throw new RangeError('percentile of an empty sequence');
  }
  return sorted[nearestRankIndex(sorted.length, percent)];
}

export function distributionOf(values: readonly number[]): Distribution {
  if (values.length === 0) {
    return { count: 0, stats: null };
  }
  const sorted = [...values].sort((a, b) => a - b);
  return {
    count: sorted.length,
    stats: {
      min: sorted[0],
      median: percentile(sorted, 50),
      p90: percentile(sorted, 90),
      p99: percentile(sorted, 99),
      max: sorted[sorted.length - 1],
    },
  };
}

function collect(samples: readonly Sample[], pick: (sample: Sample) => number | null): number[] {
  const values: number[] = [];
  for (const sample of samples) {
    const value = pick(sample);
    if (value !== null) {
      values.push(value);
    }
  }
  return values;
}

export function summarize(samples: readonly Sample[]): LatencySummary {
  const answered = samples.filter((sample) => sample.errorKind !== 'transport');

  const rttFor = (operation: OperationKind): Distribution =>
    distributionOf(collect(answered, (sample) => (sample.operation === operation ? sample.rttUs : null)));

  return {
    sampleCount: samples.length,
    metrics: {
      rtt: distributionOf(collect(answered, (sample) => sample.rttUs)),
      tickToSend: distributionOf(collect(answered, (sample) => sample.tickToSendUs)),
      tickToAck: distributionOf(collect(answered, (sample) => sample.tickToAckUs)),
      usDiff: distributionOf(collect(answered, (sample) => sample.usDiff)),
      ackToAck: distributionOf(collect(answered, (sample) => sample.ackDeltaPrevUs)),
    },
    rttByOperation: {
      open: rttFor('open'),
      edit: rttFor('edit'),
      cancel: rttFor('cancel'),
    },
  };
}
