/**
 * Error codes carried by every {@link SocketError}
 */
export type SocketErrorCode =
  | 'CONNECT_FAILED'
  | 'CONNECTION_CLOSED'
  | 'CONNECTION_LOST'
  | 'TIMEOUT'
  | 'ALREADY_OPEN'
  | 'NOT_CONNECTED'
  | 'BRIDGE_DEAD'
  | 'CONFIGURATION';

/**
 * Wire shape of an error sent across the bridge
 */
export interface SerializedError {
  name: string;
  code?: SocketErrorCode;
  message: string;
  reason?: ClosedReason;
  timedOut?: boolean;
}

/**
 * Why a {@link ConnectionClosedError} was raised
 * - `eof`: the peer closed its end of the stream
 * - `local`: the connection was closed on this side while a read was waiting
 */
export type ClosedReason = 'eof' | 'local';

/**
 * Base class for every error raised by this package
 *
 * Carries a stable string `code` so callers on the other side of the bridge
 * can tell errors apart without relying on `instanceof`.
 */
export class SocketError extends Error {
  readonly code: SocketErrorCode;

  constructor(code: SocketErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'SocketError';

    // Maintain proper stack trace for debugging
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): SerializedError {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/**
 * The connect handshake failed or did not finish within `connectionTimeout`
 */
export class ConnectError extends SocketError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super('CONNECT_FAILED', message, options);
    this.name = 'ConnectError';
    this.timedOut = options?.timedOut ?? false;
  }

  static refused(address: string, cause: unknown): ConnectError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ConnectError(`Connect call failed on ${address}: ${detail}`, { cause });
  }

  static timeout(address: string, timeout: number): ConnectError {
    return new ConnectError(`Connect call timeout on ${address} after ${timeout}ms`, {
      timedOut: true,
    });
  }

  override toJSON(): SerializedError {
    return { ...super.toJSON(), timedOut: this.timedOut };
  }
}

/**
 * The stream ended: either the peer sent EOF or the connection was closed
 * locally while a read was suspended
 */
export class ConnectionClosedError extends SocketError {
  readonly reason: ClosedReason;

  constructor(message: string, reason: ClosedReason = 'eof') {
    super('CONNECTION_CLOSED', message);
    this.name = 'ConnectionClosedError';
    this.reason = reason;
  }

  static eof(address: string): ConnectionClosedError {
    return new ConnectionClosedError(`Connection closed by peer ${address}`, 'eof');
  }

  static whileWaiting(address: string): ConnectionClosedError {
    return new ConnectionClosedError(`Connection to ${address} closed while waiting for data`, 'local');
  }

  override toJSON(): SerializedError {
    return { ...super.toJSON(), reason: this.reason };
  }
}

/**
 * An I/O error broke the stream mid-way
 */
export class ConnectionLostError extends SocketError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_LOST', message, options);
    this.name = 'ConnectionLostError';
  }

  static fromCause(address: string, cause: unknown): ConnectionLostError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ConnectionLostError(`Connection to ${address} lost: ${detail}`, { cause });
  }
}

/**
 * A single call exceeded its time budget. The connection is left open.
 */
export class TimeoutError extends SocketError {
  constructor(message: string) {
    super('TIMEOUT', message);
    this.name = 'TimeoutError';
  }

  static call(operation: string, address: string, timeout: number): TimeoutError {
    return new TimeoutError(`${operation} call timeout on '${address}' after ${timeout}ms`);
  }
}

/**
 * `open()` was called on a controller that is already connected (or connecting)
 */
export class AlreadyOpenError extends SocketError {
  constructor(message = 'Socket already open. Must close it first') {
    super('ALREADY_OPEN', message);
    this.name = 'AlreadyOpenError';
  }
}

/**
 * A data operation ran with auto-reconnect disabled and no live connection
 */
export class NotConnectedError extends SocketError {
  constructor(message = 'Socket not connected') {
    super('NOT_CONNECTED', message);
    this.name = 'NotConnectedError';
  }
}

/**
 * The bridge's scheduler thread is not running
 */
export class BridgeDeadError extends SocketError {
  constructor(message = 'Bridge scheduler thread is not running', options?: { cause?: unknown }) {
    super('BRIDGE_DEAD', message, options);
    this.name = 'BridgeDeadError';
  }
}

/**
 * Invalid address, scheme or option value
 */
export class ConfigurationError extends SocketError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors after which the engine is unusable and the controller tears it down
 */
export function isConnectionError(
  error: unknown
): error is ConnectionClosedError | ConnectionLostError {
  return error instanceof ConnectionClosedError || error instanceof ConnectionLostError;
}

/**
 * Flatten any thrown value into a structured-clone friendly shape
 */
export function serializeError(error: unknown): SerializedError {
  if (error instanceof SocketError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Rebuild an error received from the bridge with its original class
 */
export function deserializeError(data: SerializedError): Error {
  switch (data.code) {
    case 'CONNECT_FAILED':
      return new ConnectError(data.message, { timedOut: data.timedOut });
    case 'CONNECTION_CLOSED':
      return new ConnectionClosedError(data.message, data.reason);
    case 'CONNECTION_LOST':
      return new ConnectionLostError(data.message);
    case 'TIMEOUT':
      return new TimeoutError(data.message);
    case 'ALREADY_OPEN':
      return new AlreadyOpenError(data.message);
    case 'NOT_CONNECTED':
      return new NotConnectedError(data.message);
    case 'BRIDGE_DEAD':
      return new BridgeDeadError(data.message);
    case 'CONFIGURATION':
      return new ConfigurationError(data.message);
    case undefined:
      break;
  }

  const error = data.name === 'TypeError' ? new TypeError(data.message) : new Error(data.message);
  if (error.name !== data.name) {
    error.name = data.name;
  }
  return error;
}
