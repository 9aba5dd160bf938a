/**
 * Error taxonomy for a probe run.
 *
 * Only TransportError, ConfigError and AuthenticationError end a run.
 * Application-level RPC errors travel inside RpcResponse.error and are recorded, not thrown.
 */

/**
 * Connection-level failure: socket closed or errored, malformed or binary frame,
 * request serialization or send failure. Unrecoverable; there is no reconnect.
 */
export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
  }
}

/**
 * A call issued while the transport is not open. Nothing was sent.
 */
export class TransportNotOpenError extends TransportError {
  constructor(method: string, state: string, cause?: unknown) {
    super(`cannot call ${method}: transport is ${state}`, cause);
    this.name = 'TransportNotOpenError';
  }
}

/**
 * A startup lookup the probe cannot run without was rejected by the exchange.
 */
export class ExchangeRequestError extends Error {
  constructor(
    message: string,
    public readonly code: number | null = null,
  ) {
    super(message);
    this.name = 'ExchangeRequestError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(field ? `Configuration error: ${message} (field: ${field})` : `Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class AuthenticationError extends Error {
  constructor(
    message: string,
    public readonly code: number | null = null,
  ) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
