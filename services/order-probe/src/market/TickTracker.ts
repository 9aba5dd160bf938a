/**
 * Tick Tracker
 *
 * Stamps order-book pushes on arrival and keeps only the newest tick per instrument.
 * Tick-aligned latency asks how long after the latest market update a request went
 * out, so older ticks are overwritten rather than buffered.
 */

import { type Clock, Logger } from '@latlab/shared';
import { isRecord, type SubscriptionFrame } from '../transport/frames';
import type { JsonRpcWsClient } from '../transport/JsonRpcWsClient';

export interface Tick {
  instrument: string;
  channel: string;
  arrivalMonoNs: number;
  arrivalWallUs: number;
  /** Exchange-side book timestamp (ms), when the payload carries one. */
  exchangeTimestampMs: number | null;
  payload: unknown;
}

/** `book.<instrument>.<interval>`, e.g. `book.BTC-PERPETUAL.raw` */
const BOOK_CHANNEL = /^book\.([^.]+)\.([^.]+)$/;

const logger = Logger.getInstance('order-probe:ticks');

export function bookChannel(instrument: string): string {
  return `book.${instrument}.raw`;
}

export class TickTracker {
  private readonly latestByInstrument: Map<string, Tick> = new Map();
  private readonly counts: Map<string, number> = new Map();

  constructor(private readonly clock: Clock) {}

  /**
   * Feed the transport's unsolicited pushes into this tracker.
   * @returns a function that detaches the listener
   */
  attach(transport: JsonRpcWsClient): () => void {
    const listener = (frame: SubscriptionFrame): void => this.onTick(frame);
    transport.on('subscription', listener);
    return () => {
      transport.off('subscription', listener);
    };
  }

  onTick(frame: SubscriptionFrame): void {
    const { monoNs, wallUs } = this.clock.stamp();
    const channel = frame.params.channel;
    const match = BOOK_CHANNEL.exec(channel);
    if (!match) {
      logger.debug('Ignoring non-book push', undefined, { channel });
      return;
    }

    const instrument = match[1];
    const data = frame.params.data;
    const exchangeTimestamp = isRecord(data) && typeof data.timestamp === 'number' ? data.timestamp : null;

    this.latestByInstrument.set(instrument, {
      instrument,
      channel,
      arrivalMonoNs: monoNs,
      arrivalWallUs: wallUs,
      exchangeTimestampMs: exchangeTimestamp,
      payload: data,
    });
    this.counts.set(instrument, (this.counts.get(instrument) ?? 0) + 1);
  }

  latest(instrument: string): Tick | undefined {
    return this.latestByInstrument.get(instrument);
  }

  count(instrument: string): number {
    return this.counts.get(instrument) ?? 0;
  }
}
