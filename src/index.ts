/**
 * sockline
 * Line- and block-oriented TCP request/reply client with auto-reconnect,
 * usable from promise-based and blocking code alike
 *
 * @module sockline
 */

// Connection controller
export { TCP, toBytes } from './controller.js';

// Read engine and receive buffer
export { ReadEngine } from './engine.js';
export type { ReadEngineOptions, TerminalCondition } from './engine.js';
export { ByteBuffer } from './buffer.js';

// Blocking and cross-thread access
export { SyncBridge } from './bridge/bridge.js';
export type { SyncBridgeOptions } from './bridge/bridge.js';
export { AsyncTCPProxy, SyncTCPProxy, attachProxy } from './bridge/proxy.js';
export type { ProxyOptions } from './bridge/proxy.js';
export type { BridgedTCPConfig, ProxyHandle } from './bridge/protocol.js';

// URL addressing
export { parseEndpoint, socketForUrl } from './url.js';
export type { BridgedUrlConfig, UrlConfig } from './url.js';

// Operation set
export type {
  ConnectionStatus,
  LineSequence,
  LineTransport,
  OperationMode,
  Outcome,
} from './transport.js';

// Types
export {
  DEFAULT_LIMIT,
  IPTOS_LOWDELAY,
  IPTOS_MINCOST,
  IPTOS_NORMAL,
  IPTOS_RELIABILITY,
  IPTOS_THROUGHPUT,
} from './types.js';
export type {
  CallOptions,
  Callback,
  ConnectionCallbacks,
  Data,
  Endpoint,
  KeepAliveOptions,
  LineOptions,
  OpenOptions,
  ReadUntilOptions,
  Remote,
  SocketOptions,
  TCPConfig,
  TimeoutOptions,
} from './types.js';

// Errors
export {
  AlreadyOpenError,
  BridgeDeadError,
  ConfigurationError,
  ConnectError,
  ConnectionClosedError,
  ConnectionLostError,
  NotConnectedError,
  SocketError,
  TimeoutError,
  deserializeError,
  isConnectionError,
  serializeError,
} from './error.js';
export type { ClosedReason, SerializedError, SocketErrorCode } from './error.js';

// Logger
export { createLogger, noopLogger, summarize } from './logger.js';
export type { LogFormat, LogLevel, Logger, LoggerConfig } from './logger.js';
