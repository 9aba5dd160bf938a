/**
 * JSON-RPC over WebSocket transport
 *
 * Owns the single connection to the exchange gateway. Every outbound request gets a
 * unique numeric id and a one-shot completion slot; every inbound frame is classified
 * as either the reply to an in-flight request (matched by id, never by arrival order)
 * or an unsolicited push, which is re-emitted as a `subscription` event.
 *
 * Calls have no deadline: a call waits until its reply arrives or the connection
 * fails. Any connection-level failure is fatal for the client and rejects every
 * in-flight call with a TransportError; there is no reconnect.
 *
 * The transport takes no timestamps. Callers stamp send/ack around `call()`.
 */

import { EventEmitter } from 'eventemitter3';
import WebSocket from 'ws';
import { Logger } from '@latlab/shared';
import { TransportError, TransportNotOpenError } from '../utils/errors';
import {
  HeartbeatFrameSchema,
  isRecord,
  ResponseFrameSchema,
  type RpcId,
  type RpcParams,
  type RpcRequest,
  type RpcResponse,
  SubscriptionFrameSchema,
  type SubscriptionFrame,
  toRpcResponse,
} from './frames';

export const DERIBIT_TESTNET_URL = 'wss://test.deribit.com/ws/api/v2';
export const DERIBIT_MAINNET_URL = 'wss://www.deribit.com/ws/api/v2';

export type TransportState = 'idle' | 'connecting' | 'open' | 'failed' | 'closed';

export interface RpcCaller {
  call(method: string, params?: RpcParams): Promise<RpcResponse>;
}

export interface AuthenticatedRpcCaller extends RpcCaller {
  setAccessToken(token: string): void;
}

export interface TransportEvents {
  subscription: (frame: SubscriptionFrame) => void;
  failed: (error: TransportError) => void;
}

export type TransportStats = {
  requestsSent: number;
  responsesMatched: number;
  pushesReceived: number;
  framesDiscarded: number;
  inFlight: number;
};

interface PendingCall {
  method: string;
  resolve: (response: RpcResponse) => void;
  reject: (error: TransportError) => void;
}

const logger = Logger.getInstance('order-probe:transport');

export class JsonRpcWsClient extends EventEmitter<TransportEvents> implements AuthenticatedRpcCaller {
  private socket: WebSocket | null = null;
  private state: TransportState = 'idle';
  private failure: TransportError | null = null;
  private nextId: RpcId = 1;
  private accessToken: string | null = null;
  private readonly pending: Map<RpcId, PendingCall> = new Map();
  private connectWaiter: { resolve: () => void; reject: (error: TransportError) => void } | null =
    null;
  private stats: TransportStats = {
    requestsSent: 0,
    responsesMatched: 0,
    pushesReceived: 0,
    framesDiscarded: 0,
    inFlight: 0,
  };

  constructor(private readonly url: string) {
    super();
  }

  static forNetwork(testnet: boolean): JsonRpcWsClient {
    return new JsonRpcWsClient(testnet ? DERIBIT_TESTNET_URL : DERIBIT_MAINNET_URL);
  }

  getState(): TransportState {
    return this.state;
  }

  getFailure(): TransportError | null {
    return this.failure;
  }

  getStats(): TransportStats {
    return { ...this.stats, inFlight: this.pending.size };
  }

  /**
   * Opaque bearer token attached as `access_token` to every `private/*` request.
   */
  setAccessToken(token: string): void {
    this.accessToken = token;
  }

  connect(): Promise<void> {
    if (this.state !== 'idle') {
      return Promise.reject(new TransportError(`cannot connect: transport is ${this.state}`));
    }

    this.state = 'connecting';
    logger.info(`Connecting to ${this.url}`);

    return new Promise<void>((resolve, reject) => {
      this.connectWaiter = { resolve, reject };

      let socket: WebSocket;
      try {
        socket = new WebSocket(this.url);
      } catch (error) {
        this.fail(new TransportError(`failed to open WebSocket to ${this.url}`, error));
        return;
      }
      this.socket = socket;

      socket.on('open', () => {
        if (this.state !== 'connecting') return;
        this.state = 'open';
        logger.info('WebSocket connected', undefined, { url: this.url });
        const waiter = this.connectWaiter;
        this.connectWaiter = null;
        waiter?.resolve();
      });

      socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        this.handleFrame(data, isBinary);
      });

      socket.on('error', (error: Error) => {
        this.fail(new TransportError(`WebSocket error: ${error.message}`, error));
      });

      socket.on('close', (code: number, reason: Buffer) => {
        const text = reason?.toString() ?? '';
        this.fail(
          new TransportError(`WebSocket closed (code=${code}${text ? `, reason=${text}` : ''})`),
        );
      });
    });
  }

  /**
   * Issue one request and wait for the reply carrying the same id.
   */
  call(method: string, params: RpcParams = {}): Promise<RpcResponse> {
    if (this.state !== 'open' || !this.socket) {
      return Promise.reject(new TransportNotOpenError(method, this.state, this.failure ?? undefined));
    }

    const id = this.nextId++;
    const request: RpcRequest = {
      jsonrpc: '2.0',
      id,
      method,
      params: this.withAccessToken(method, params),
    };

    let payload: string;
    try {
      payload = JSON.stringify(request);
    } catch (error) {
      const failure = new TransportError(`failed to serialize ${method} request`, error);
      this.fail(failure);
      return Promise.reject(failure);
    }

    const socket = this.socket;
    return new Promise<RpcResponse>((resolve, reject) => {
      this.pending.set(id, { method, resolve, reject });
      this.stats.requestsSent++;
      socket.send(payload, (error?: Error) => {
        if (error) {
          this.fail(new TransportError(`failed to send ${method} (id=${id})`, error));
        }
      });
    });
  }

  /**
   * Orderly shutdown at the end of a run.
   */
  close(): void {
    if (this.state === 'closed' || this.state === 'failed') {
      return;
    }
    this.state = 'closed';
    const closed = new TransportError('transport closed');
    const waiter = this.connectWaiter;
    this.connectWaiter = null;
    waiter?.reject(closed);
    this.rejectAll(closed);
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
    logger.info('Transport closed', undefined, this.getStats());
  }

  private withAccessToken(method: string, params: RpcParams): RpcParams {
    if (this.accessToken && method.startsWith('private/')) {
      return { ...params, access_token: this.accessToken };
    }
    return params;
  }

  private handleFrame(data: WebSocket.RawData, isBinary: boolean): void {
    if (this.state !== 'open') {
      return;
    }
    if (isBinary === true) {
      this.fail(new TransportError('protocol violation: unexpected binary frame'));
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(rawDataToString(data));
    } catch (error) {
      this.fail(new TransportError('protocol violation: frame is not valid JSON', error));
      return;
    }

    if (isRecord(raw) && raw.id !== undefined && raw.id !== null) {
      this.routeResponse(raw);
      return;
    }

    const subscription = SubscriptionFrameSchema.safeParse(raw);
    if (subscription.success) {
      this.stats.pushesReceived++;
      this.emit('subscription', subscription.data);
      return;
    }

    const heartbeat = HeartbeatFrameSchema.safeParse(raw);
    if (heartbeat.success) {
      if (heartbeat.data.params.type === 'test_request') {
        this.answerHeartbeat();
      }
      return;
    }

    this.stats.framesDiscarded++;
    logger.debug('Discarding unsolicited frame', undefined, { frame: raw });
  }

  private routeResponse(raw: Record<string, unknown>): void {
    const id = typeof raw.id === 'number' ? raw.id : Number(raw.id);
    const pending = this.pending.get(id);
    if (!pending) {
      this.stats.framesDiscarded++;
      logger.debug('Discarding reply with no in-flight request', undefined, { id: raw.id });
      return;
    }

    const parsed = ResponseFrameSchema.safeParse(raw);
    if (!parsed.success) {
      this.fail(
        new TransportError(
          `protocol violation: malformed reply to ${pending.method} (id=${id})`,
          parsed.error,
        ),
      );
      return;
    }

    this.pending.delete(id);
    this.stats.responsesMatched++;
    pending.resolve(toRpcResponse(id, parsed.data));
  }

  /**
   * Fire-and-forget keepalive reply; it takes an id but no completion slot.
   */
  private answerHeartbeat(): void {
    if (!this.socket) return;
    const request: RpcRequest = { jsonrpc: '2.0', id: this.nextId++, method: 'public/test', params: {} };
    this.socket.send(JSON.stringify(request), (error?: Error) => {
      if (error) {
        this.fail(new TransportError('failed to answer heartbeat', error));
      }
    });
  }

  private fail(error: TransportError): void {
    if (this.state === 'failed' || this.state === 'closed') {
      return;
    }
    this.state = 'failed';
    this.failure = error;
    logger.error('Transport failed', error, undefined, { inFlight: this.pending.size });

    const waiter = this.connectWaiter;
    this.connectWaiter = null;
    waiter?.reject(error);

    this.rejectAll(error);
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
    this.emit('failed', error);
  }

  private rejectAll(error: TransportError): void {
    const pending = Array.from(this.pending.values());
    this.pending.clear();
    for (const call of pending) {
      call.reject(error);
    }
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
