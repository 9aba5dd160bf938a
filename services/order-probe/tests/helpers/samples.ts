import type { Sample } from '../../src/types';

export function makeSample(overrides: Partial<Sample> = {}): Sample {
  return {
    sequence: 1,
    iteration: 1,
    operation: 'open',
    rpcMethod: 'private/buy',
    instrumentName: 'BTC-PERPETUAL',
    orderId: 'ord-1',
    sendMonoNs: 1_000_000,
    ackMonoNs: 1_500_000,
    sendWallUs: 1_700_000_000_000_000,
    ackWallUs: 1_700_000_000_000_500,
    rttUs: 500,
    rttWallUs: 500,
    usIn: null,
    usOut: null,
    usDiff: null,
    tickMonoNs: null,
    tickToSendUs: null,
    tickToAckUs: null,
    ackDeltaPrevUs: null,
    errorKind: null,
    errorCode: null,
    errorMessage: null,
    clockAnomaly: false,
    ...overrides,
  };
}
