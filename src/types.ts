import type { Logger } from './logger.js';

/**
 * Bytes accepted by the write family of operations
 */
export type Data = string | Uint8Array;

/** Immutable address of the single remote peer of a controller */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/** IP type-of-service hints (RFC 1349) */
export const IPTOS_NORMAL = 0x0;
export const IPTOS_LOWDELAY = 0x10;
export const IPTOS_THROUGHPUT = 0x08;
export const IPTOS_RELIABILITY = 0x04;
export const IPTOS_MINCOST = 0x02;

/** Default receive high-water mark: 1 MiB */
export const DEFAULT_LIMIT = 2 ** 20;

/**
 * OS-level keep-alive settings. Durations in milliseconds.
 */
export interface KeepAliveOptions {
  /** Enable SO_KEEPALIVE */
  active?: boolean;

  /** Idle time before the first probe (TCP_KEEPIDLE) */
  idle?: number;

  /** Time between probes (TCP_KEEPINTVL) */
  interval?: number;

  /** Number of unanswered probes before the connection drops (TCP_KEEPCNT) */
  retry?: number;
}

/**
 * Socket options applied right after the connect handshake
 */
export interface SocketOptions {
  /**
   * Disable Nagle's algorithm
   * @default true
   */
  noDelay?: boolean;

  /**
   * IP type-of-service hint
   * @default IPTOS_LOWDELAY
   */
  tos?: number;

  /**
   * Keep-alive configuration; `true`/`false` only toggles SO_KEEPALIVE
   */
  keepAlive?: boolean | KeepAliveOptions;
}

/**
 * A lifecycle hook. It may return a promise; the controller awaits it
 * before the transition that triggered it is complete.
 */
export type Callback<Args extends unknown[] = []> = (...args: Args) => void | Promise<void>;

/**
 * User hooks fired on connection lifecycle transitions
 */
export interface ConnectionCallbacks {
  /** Fired after every successful `open()` */
  onConnectionMade?: Callback;

  /** Fired when the receive loop stops on an I/O error */
  onConnectionLost?: Callback<[cause: Error]>;

  /** Fired when the peer closes its end of the stream */
  onEofReceived?: Callback;
}

/**
 * TCP controller configuration. Durations in milliseconds.
 */
export interface TCPConfig extends SocketOptions, ConnectionCallbacks {
  host: string;
  port: number;

  /**
   * Default line terminator for the readLine family
   * @default '\n'
   */
  eol?: Data;

  /**
   * Reopen the connection transparently when an operation needs it
   * @default true
   */
  autoReconnect?: boolean;

  /**
   * Default budget for every data operation; undefined means no limit
   */
  timeout?: number;

  /**
   * Budget for the connect handshake; undefined means no limit
   */
  connectionTimeout?: number;

  /**
   * Receive high-water mark in bytes. The socket is paused while this much
   * unread data is buffered.
   * @default 1 MiB
   */
  limit?: number;

  /**
   * Run the public operations of this controller one at a time
   * @default false
   */
  exclusive?: boolean;

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;

  /**
   * Logger to use instead of the built-in console logger
   */
  logger?: Logger;
}

/**
 * Budget for a single call
 */
export interface TimeoutOptions {
  /**
   * Budget for this call in milliseconds; overrides the controller default
   */
  timeout?: number;
}

/**
 * Options accepted by every data operation
 */
export interface CallOptions extends TimeoutOptions {
  /**
   * Abandon the call when this signal aborts
   */
  signal?: AbortSignal;
}

/**
 * Options for the readLine family
 */
export interface LineOptions extends CallOptions {
  /**
   * Line terminator for this call; overrides the controller's `eol`
   */
  eol?: Data;
}

/**
 * Options for `readUntil`
 */
export interface ReadUntilOptions extends CallOptions {
  /**
   * Drop the separator from the returned bytes
   * @default false
   */
  strip?: boolean;
}

/**
 * Options that can cross a thread boundary (no AbortSignal)
 */
export type Remote<T extends CallOptions> = Omit<T, 'signal'>;

/**
 * Options for `open`
 */
export interface OpenOptions {
  /**
   * Connect budget in milliseconds; overrides `connectionTimeout`
   */
  timeout?: number;
}
