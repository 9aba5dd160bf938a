/**
 * Order Lifecycle Driver
 *
 * Runs open -> edit -> cancel for one synthetic resting order per iteration and
 * records a latency sample for every request it issues. Iterations are strictly
 * sequential with the configured delay after each request, so every call is
 * measured on an otherwise idle connection.
 *
 * State per iteration: idle -> opened -> edited -> cancelled, or
 * idle -> skipped-edit when the open reply carries no order id (edit and cancel are
 * then not sent, and the iteration ends with a second delay in their place).
 * A TransportError ends the whole run.
 */

import { type Clock, Logger } from '@latlab/shared';
import { z } from 'zod';
import type { ProbeConfig } from '../config/ConfigSchema';
import type { LatencyRecorder, SampleContext } from '../latency/LatencyRecorder';
import type { RpcParams, RpcResponse } from '../transport/frames';
import type { RpcCaller } from '../transport/JsonRpcWsClient';
import type { IterationOutcome, LifecycleState, OperationKind, Sample } from '../types';
import { TransportError, TransportNotOpenError } from '../utils/errors';
import { editedOffsetPercent, initialOffsetPercent, priceAtOffset } from './pricing';

/**
 * Market reference resolved at startup.
 */
export interface MarketReference {
  referencePrice: number;
  tickSize: number;
}

export type LifecycleSettings = Pick<
  ProbeConfig,
  | 'side'
  | 'instrumentName'
  | 'orderAmount'
  | 'priceOffsetPercent'
  | 'editOffsetStepPercent'
  | 'numIterations'
  | 'sleepBetweenRequestsSecs'
>;

export interface OrderLifecycleDeps {
  transport: RpcCaller;
  recorder: LatencyRecorder;
  clock: Clock;
}

interface OrderState {
  orderId: string | null;
  offsetPercent: number;
  price: number;
}

const OpenResultSchema = z
  .object({
    order: z.object({ order_id: z.string().min(1) }).passthrough(),
  })
  .passthrough();

const logger = Logger.getInstance('order-probe:lifecycle');

export function extractOrderId(response: RpcResponse): string | null {
  const parsed = OpenResultSchema.safeParse(response.result);
  return parsed.success ? parsed.data.order.order_id : null;
}

export class OrderLifecycleDriver {
  private readonly sleepMs: number;

  constructor(
    private readonly settings: LifecycleSettings,
    private readonly market: MarketReference,
    private readonly deps: OrderLifecycleDeps,
  ) {
    this.sleepMs = Math.round(settings.sleepBetweenRequestsSecs * 1000);
  }

  /**
   * Run every configured iteration. Rejects with the TransportError that ended the run.
   */
  async run(): Promise<IterationOutcome[]> {
    const outcomes: IterationOutcome[] = [];
    for (let iteration = 1; iteration <= this.settings.numIterations; iteration++) {
      logger.info(`Iteration ${iteration}/${this.settings.numIterations}`);
      outcomes.push(await this.runIteration(iteration));
    }
    return outcomes;
  }

  async runIteration(iteration: number): Promise<IterationOutcome> {
    const { side } = this.settings;
    const samples: Sample[] = [];
    let state: LifecycleState = 'idle';

    // idle -> opened
    const offsetPercent = initialOffsetPercent(side, this.settings.priceOffsetPercent);
    const order: OrderState = {
      orderId: null,
      offsetPercent,
      price: priceAtOffset(this.market.referencePrice, offsetPercent, this.market.tickSize),
    };

    const openMethod = side === 'buy' ? 'private/buy' : 'private/sell';
    const opened = await this.timedCall(iteration, 'open', openMethod, null, {
      instrument_name: this.settings.instrumentName,
      amount: this.settings.orderAmount,
      type: 'limit',
      price: order.price,
      post_only: true,
    }, extractOrderId);
    samples.push(opened.sample);
    order.orderId = opened.sample.orderId;
    await this.pause();

    if (order.orderId === null) {
      const skipReason = opened.response.error
        ? `open rejected (${opened.response.error.message}); no order id to edit or cancel`
        : 'open reply carried no order id; skipping edit and cancel';
      logger.warn(skipReason, undefined, { iteration });
      await this.pause();
      return { iteration, finalState: 'skipped-edit', orderId: null, samples, skipReason };
    }
    state = 'opened';

    // opened -> edited
    order.offsetPercent = editedOffsetPercent(side, order.offsetPercent, this.settings.editOffsetStepPercent);
    order.price = priceAtOffset(this.market.referencePrice, order.offsetPercent, this.market.tickSize);
    const edited = await this.timedCall(iteration, 'edit', 'private/edit', order.orderId, {
      order_id: order.orderId,
      amount: this.settings.orderAmount,
      price: order.price,
    });
    samples.push(edited.sample);
    state = 'edited';
    await this.pause();

    // edited -> cancelled
    const cancelled = await this.timedCall(iteration, 'cancel', 'private/cancel', order.orderId, {
      order_id: order.orderId,
    });
    samples.push(cancelled.sample);
    state = 'cancelled';
    await this.pause();

    return { iteration, finalState: state, orderId: order.orderId, samples };
  }

  /**
   * Stamp immediately around the transport call. RPC errors are recorded and logged;
   * a TransportError is recorded and rethrown, unless the request was never sent.
   */
  private async timedCall(
    iteration: number,
    operation: OperationKind,
    rpcMethod: string,
    orderId: string | null,
    params: RpcParams,
    resolveOrderId?: (response: RpcResponse) => string | null,
  ): Promise<{ sample: Sample; response: RpcResponse }> {
    const context: SampleContext = {
      iteration,
      operation,
      rpcMethod,
      instrumentName: this.settings.instrumentName,
      orderId,
    };

    let response: RpcResponse;
    context.tick = this.deps.recorder.tickBefore(this.settings.instrumentName);
    const send = this.deps.clock.stamp();
    try {
      response = await this.deps.transport.call(rpcMethod, params);
    } catch (error) {
      const ack = this.deps.clock.stamp();
      if (error instanceof TransportError && !(error instanceof TransportNotOpenError)) {
        this.deps.recorder.record(context, send, ack, error);
      }
      throw error;
    }
    const ack = this.deps.clock.stamp();

    if (resolveOrderId) {
      context.orderId = resolveOrderId(response);
    }
    const sample = this.deps.recorder.record(context, send, ack, response);

    if (response.error) {
      logger.warn(`${operation} returned an RPC error`, undefined, {
        iteration,
        method: rpcMethod,
        code: response.error.code,
        message: response.error.message,
      });
    } else {
      logger.debug(`${operation} acknowledged`, undefined, {
        iteration,
        orderId: context.orderId,
        rttUs: sample.rttUs,
        usDiff: sample.usDiff,
      });
    }

    return { sample, response };
  }

  private pause(): Promise<void> {
    return this.deps.clock.sleep(this.sleepMs);
  }
}
