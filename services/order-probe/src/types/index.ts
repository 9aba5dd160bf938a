/**
 * Order Probe Types
 *
 * Core data structures shared by the lifecycle driver, recorder and sinks.
 */

export type OrderSide = 'buy' | 'sell';

export type OperationKind = 'open' | 'edit' | 'cancel';

export const OPERATION_KINDS: readonly OperationKind[] = ['open', 'edit', 'cancel'];

/**
 * Where a recorded call failed, if it did.
 * `rpc`: well-formed reply carrying an application error. `transport`: the call never got a reply.
 */
export type SampleErrorKind = 'rpc' | 'transport';

/**
 * One row per RPC interaction. Monotonic values are nanoseconds since the probe's
 * clock origin, wall-clock values are microseconds since the Unix epoch, derived
 * durations are microseconds.
 */
export interface Sample {
  readonly sequence: number;
  readonly iteration: number;
  readonly operation: OperationKind;
  readonly rpcMethod: string;
  readonly instrumentName: string;
  readonly orderId: string | null;

  readonly sendMonoNs: number;
  readonly ackMonoNs: number;
  readonly sendWallUs: number;
  readonly ackWallUs: number;

  readonly rttUs: number;
  readonly rttWallUs: number;

  readonly usIn: number | null;
  readonly usOut: number | null;
  readonly usDiff: number | null;

  readonly tickMonoNs: number | null;
  readonly tickToSendUs: number | null;
  readonly tickToAckUs: number | null;

  /** Ack-to-ack delta against the previous sample of the same operation kind. */
  readonly ackDeltaPrevUs: number | null;

  readonly errorKind: SampleErrorKind | null;
  readonly errorCode: number | null;
  readonly errorMessage: string | null;

  /** Negative RTT or negative usDiff; the values are kept as measured. */
  readonly clockAnomaly: boolean;
}

/**
 * Consumer of samples as they are recorded (CSV file, test collector).
 */
export interface SampleSink {
  write(sample: Sample): void;
}

export type LifecycleState = 'idle' | 'opened' | 'edited' | 'cancelled' | 'skipped-edit';

export interface IterationOutcome {
  iteration: number;
  finalState: LifecycleState;
  orderId: string | null;
  samples: readonly Sample[];
  skipReason?: string;
}
