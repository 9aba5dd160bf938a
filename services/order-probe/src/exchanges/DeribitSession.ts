/**
 * Deribit session setup
 *
 * Startup calls that precede measurement: authentication, book subscription and
 * instrument/ticker lookups. None of these produce latency samples.
 */

import { Logger } from '@latlab/shared';
import { z } from 'zod';
import { bookChannel } from '../market/TickTracker';
import type { RpcResponse } from '../transport/frames';
import type { AuthenticatedRpcCaller } from '../transport/JsonRpcWsClient';
import { AuthenticationError, ExchangeRequestError } from '../utils/errors';

export const DEFAULT_TICK_SIZE = 0.5;

const AuthResultSchema = z.object({ access_token: z.string().min(1) }).passthrough();
const InstrumentResultSchema = z.object({ tick_size: z.number().positive() }).passthrough();
const TickerResultSchema = z
  .object({
    mark_price: z.number().positive().nullable().optional(),
    last_price: z.number().positive().nullable().optional(),
  })
  .passthrough();

const logger = Logger.getInstance('order-probe:session');

function describeError(response: RpcResponse): string {
  return response.error ? `${response.error.code ?? 'n/a'}: ${response.error.message}` : 'no error';
}

export class DeribitSession {
  constructor(private readonly transport: AuthenticatedRpcCaller) {}

  /**
   * Exchange client credentials for a bearer token and attach it to later private calls.
   */
  async authenticate(clientId: string, clientSecret: string): Promise<string> {
    const response = await this.transport.call('public/auth', {
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
    });

    if (response.error) {
      throw new AuthenticationError(`auth error ${describeError(response)}`, response.error.code);
    }

    const parsed = AuthResultSchema.safeParse(response.result);
    if (!parsed.success) {
      throw new AuthenticationError('auth reply carried no access_token');
    }

    this.transport.setAccessToken(parsed.data.access_token);
    logger.info('Authenticated', undefined, { testnet: response.testnet ?? null });
    return parsed.data.access_token;
  }

  /**
   * Subscribe to raw book updates. A rejected subscription only disables tick alignment.
   */
  async subscribeRawBook(instrument: string): Promise<boolean> {
    const channel = bookChannel(instrument);
    logger.info(`Subscribing to ${channel}`);
    const response = await this.transport.call('public/subscribe', { channels: [channel] });
    if (response.error) {
      logger.warn('Subscribe error', undefined, { channel, error: describeError(response) });
      return false;
    }
    logger.info('Subscription successful', undefined, { channel });
    return true;
  }

  /**
   * An RPC error here is fatal; the default tick size only covers a reply without `tick_size`.
   */
  async fetchTickSize(instrument: string): Promise<number> {
    const response = await this.transport.call('public/get_instrument', { instrument_name: instrument });
    if (response.error) {
      throw new ExchangeRequestError(`get_instrument error ${describeError(response)}`, response.error.code);
    }
    const parsed = InstrumentResultSchema.safeParse(response.result);
    if (!parsed.success) {
      logger.warn('Instrument has no tick_size, using default', undefined, { instrument, tickSize: DEFAULT_TICK_SIZE });
      return DEFAULT_TICK_SIZE;
    }
    return parsed.data.tick_size;
  }

  /**
   * Mark price, then last price; `fallback` when the ticker has neither.
   */
  async fetchReferencePrice(instrument: string, fallback: number): Promise<number> {
    const response = await this.transport.call('public/ticker', { instrument_name: instrument });
    if (response.error) {
      logger.warn('Ticker error, using configured base price', undefined, {
        instrument,
        error: describeError(response),
        basePrice: fallback,
      });
      return fallback;
    }
    const parsed = TickerResultSchema.safeParse(response.result);
    const price = parsed.success ? parsed.data.mark_price ?? parsed.data.last_price : null;
    return price ?? fallback;
  }
}
