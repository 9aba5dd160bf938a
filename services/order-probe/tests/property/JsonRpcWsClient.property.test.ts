/**
 * Property-based tests for request/response correlation
 */

import * as fc from 'fast-check';
import { JsonRpcWsClient } from '../../src/transport/JsonRpcWsClient';
import { MockWebSocket } from '../helpers/MockWebSocket';

jest.mock('ws', () => jest.requireActual('../helpers/MockWebSocket').MockWebSocket);

describe('JsonRpcWsClient Property Tests', () => {
  beforeEach(() => {
    jest.spyOn(console, 'debug').mockImplementation();
    jest.spyOn(console, 'info').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('every call resolves with the reply carrying its own id, whatever the arrival order', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 20 }).chain((count) =>
          fc.tuple(fc.constant(count), fc.shuffledSubarray([...Array(count).keys()], { minLength: count })),
        ),
        async ([count, order]) => {
          MockWebSocket.reset();
          const client = new JsonRpcWsClient('wss://example.invalid');
          const connecting = client.connect();
          const socket = MockWebSocket.latest();
          socket.open();
          await connecting;

          const calls = Array.from({ length: count }, (_, i) => client.call('public/test', { seq: i }));
          for (const index of order) {
            socket.receive({ jsonrpc: '2.0', id: index + 1, result: { seq: index } });
          }

          const responses = await Promise.all(calls);
          client.close();
          return responses.every(
            (response, i) => response.id === i + 1 && JSON.stringify(response.result) === JSON.stringify({ seq: i }),
          );
        },
      ),
      { numRuns: 50 },
    );
  });
});
