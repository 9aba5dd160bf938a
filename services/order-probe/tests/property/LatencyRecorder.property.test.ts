/**
 * Property-based tests for sample derivation
 */

import * as fc from 'fast-check';
import { LatencyRecorder } from '../../src/latency/LatencyRecorder';

const context = {
  iteration: 1,
  operation: 'edit' as const,
  rpcMethod: 'private/edit',
  instrumentName: 'BTC-PERPETUAL',
  orderId: 'ord-1',
};

const engineUs = fc.integer({ min: 1_600_000_000_000_000, max: 1_800_000_000_000_000 });

describe('LatencyRecorder Property Tests', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('RTT is non-negative and exact whenever ack follows send', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 1_000_000_000_000 }),
        fc.integer({ min: 0, max: 10_000_000_000 }),
        (sendNs, elapsedNs) => {
          const recorder = new LatencyRecorder();
          const sample = recorder.record(
            context,
            { monoNs: sendNs, wallUs: 0 },
            { monoNs: sendNs + elapsedNs, wallUs: 0 },
            { id: 1, result: {} },
          );
          return sample.rttUs >= 0 && sample.rttUs === elapsedNs / 1000 && !sample.clockAnomaly;
        },
      ),
    );
  });

  test('usDiff always equals usOut - usIn', () => {
    fc.assert(
      fc.property(engineUs, engineUs, fc.integer(), (usIn, usOut, reported) => {
        const recorder = new LatencyRecorder();
        const sample = recorder.record(
          context,
          { monoNs: 0, wallUs: 0 },
          { monoNs: 1_000, wallUs: 1 },
          { id: 1, result: {}, usIn, usOut, usDiff: reported },
        );
        return sample.usDiff === usOut - usIn && sample.clockAnomaly === usOut < usIn;
      }),
    );
  });

  test('sequence numbers are 1-based and contiguous', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 50 }), (count) => {
        const recorder = new LatencyRecorder();
        for (let i = 0; i < count; i++) {
          recorder.record(context, { monoNs: i, wallUs: 0 }, { monoNs: i + 1, wallUs: 0 }, { id: i, result: {} });
        }
        return recorder.samples().every((sample, index) => sample.sequence === index + 1);
      }),
    );
  });
});
