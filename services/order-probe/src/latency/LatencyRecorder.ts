/**
 * Latency Recorder
 *
 * Turns one RPC interaction (send stamp, ack stamp, reply or transport failure) into
 * an immutable Sample and appends it to the run's ordered sequence.
 */

import { type ClockStamp, Logger } from '@latlab/shared';
import type { Tick, TickTracker } from '../market/TickTracker';
import type { RpcResponse } from '../transport/frames';
import type { OperationKind, Sample, SampleSink } from '../types';
import { TransportError } from '../utils/errors';

export interface SampleContext {
  iteration: number;
  operation: OperationKind;
  rpcMethod: string;
  instrumentName: string;
  orderId: string | null;
  /** Latest tick taken just before the send stamp; see `tickBefore`. */
  tick?: Tick;
}

export interface LatencyRecorderOptions {
  /** Tick alignment is off when the book subscription is disabled. */
  ticks?: TickTracker;
  sink?: SampleSink;
}

const logger = Logger.getInstance('order-probe:recorder');

function nsToUs(ns: number): number {
  return ns / 1000;
}

export class LatencyRecorder {
  private readonly recorded: Sample[] = [];
  private readonly lastAckByOperation: Map<OperationKind, number> = new Map();

  constructor(private readonly options: LatencyRecorderOptions = {}) {}

  /**
   * Snapshot of the latest tick for `instrument`, to be taken immediately before the
   * send stamp. A push that lands while the call is in flight must not replace it.
   */
  tickBefore(instrument: string): Tick | undefined {
    return this.options.ticks?.latest(instrument);
  }

  record(
    context: SampleContext,
    send: ClockStamp,
    ack: ClockStamp,
    outcome: RpcResponse | TransportError,
  ): Sample {
    const tickMonoNs = context.tick ? context.tick.arrivalMonoNs : null;

    const response = outcome instanceof TransportError ? null : outcome;
    const usIn = response?.usIn ?? null;
    const usOut = response?.usOut ?? null;
    const usDiff = usIn !== null && usOut !== null ? usOut - usIn : null;

    const rttUs = nsToUs(ack.monoNs - send.monoNs);
    const previousAck = this.lastAckByOperation.get(context.operation);
    this.lastAckByOperation.set(context.operation, ack.monoNs);

    let errorKind: Sample['errorKind'] = null;
    let errorCode: number | null = null;
    let errorMessage: string | null = null;
    if (outcome instanceof TransportError) {
      errorKind = 'transport';
      errorMessage = outcome.message;
    } else if (outcome.error) {
      errorKind = 'rpc';
      errorCode = outcome.error.code;
      errorMessage = outcome.error.message;
    }

    const clockAnomaly = rttUs < 0 || (usDiff !== null && usDiff < 0);

    const sample: Sample = Object.freeze({
      sequence: this.recorded.length + 1,
      iteration: context.iteration,
      operation: context.operation,
      rpcMethod: context.rpcMethod,
      instrumentName: context.instrumentName,
      orderId: context.orderId,
      sendMonoNs: send.monoNs,
      ackMonoNs: ack.monoNs,
      sendWallUs: send.wallUs,
      ackWallUs: ack.wallUs,
      rttUs,
      rttWallUs: ack.wallUs - send.wallUs,
      usIn,
      usOut,
      usDiff,
      tickMonoNs,
      tickToSendUs: tickMonoNs === null ? null : nsToUs(send.monoNs - tickMonoNs),
      tickToAckUs: tickMonoNs === null ? null : nsToUs(ack.monoNs - tickMonoNs),
      ackDeltaPrevUs: previousAck === undefined ? null : nsToUs(ack.monoNs - previousAck),
      errorKind,
      errorCode,
      errorMessage,
      clockAnomaly,
    });

    if (clockAnomaly) {
      logger.warn('Clock anomaly recorded', undefined, {
        sequence: sample.sequence,
        operation: sample.operation,
        rttUs,
        usDiff,
      });
    }

    this.recorded.push(sample);
    this.options.sink?.write(sample);
    return sample;
  }

  samples(): readonly Sample[] {
    return this.recorded;
  }

  size(): number {
    return this.recorded.length;
  }
}
