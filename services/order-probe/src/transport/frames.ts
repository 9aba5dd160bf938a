/**
 * JSON-RPC 2.0 frame shapes exchanged with the exchange gateway.
 *
 * Only the fields the probe reads are typed; everything else passes through untouched.
 */

import { z } from 'zod';

export type RpcId = number;

export type RpcParams = Record<string, unknown>;

export interface RpcRequest {
  jsonrpc: '2.0';
  id: RpcId;
  method: string;
  params: RpcParams;
}

export const RpcErrorSchema = z
  .object({
    code: z.number().nullable().optional(),
    message: z.string().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

const EngineTimestamp = z.number().optional();

export const ResponseFrameSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    result: z.unknown().optional(),
    error: RpcErrorSchema.nullable().optional(),
    usIn: EngineTimestamp,
    usOut: EngineTimestamp,
    usDiff: EngineTimestamp,
    testnet: z.boolean().optional(),
  })
  .passthrough();

export const SubscriptionFrameSchema = z
  .object({
    method: z.literal('subscription'),
    params: z
      .object({
        channel: z.string(),
        data: z.unknown(),
      })
      .passthrough(),
  })
  .passthrough();

export const HeartbeatFrameSchema = z
  .object({
    method: z.literal('heartbeat'),
    params: z.object({ type: z.string() }).passthrough(),
  })
  .passthrough();

export type ResponseFrame = z.infer<typeof ResponseFrameSchema>;
export type SubscriptionFrame = z.infer<typeof SubscriptionFrameSchema>;

export interface RpcErrorPayload {
  code: number | null;
  message: string;
  data?: unknown;
}

/**
 * Reply matched to a request. An application error is carried in `error`; it is
 * still a successful call from the transport's point of view.
 */
export interface RpcResponse {
  id: RpcId;
  result?: unknown;
  error?: RpcErrorPayload;
  usIn?: number;
  usOut?: number;
  usDiff?: number;
  testnet?: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function engineField(frame: ResponseFrame, key: 'usIn' | 'usOut' | 'usDiff'): number | undefined {
  const topLevel = frame[key];
  if (topLevel !== undefined) {
    return topLevel;
  }
  if (isRecord(frame.result)) {
    const nested = frame.result[key];
    if (typeof nested === 'number') {
      return nested;
    }
  }
  return undefined;
}

/**
 * Engine timestamps sit at the top level of the reply; some gateways nest them in `result`.
 */
export function toRpcResponse(id: RpcId, frame: ResponseFrame): RpcResponse {
  const response: RpcResponse = { id, result: frame.result };

  if (frame.error) {
    response.error = {
      code: frame.error.code ?? null,
      message: frame.error.message ?? 'unknown error',
      data: frame.error.data,
    };
  }

  const usIn = engineField(frame, 'usIn');
  const usOut = engineField(frame, 'usOut');
  const usDiff = engineField(frame, 'usDiff');
  if (usIn !== undefined) response.usIn = usIn;
  if (usOut !== undefined) response.usOut = usOut;
  if (usDiff !== undefined) response.usDiff = usDiff;
  if (frame.testnet !== undefined) response.testnet = frame.testnet;

  return response;
}
