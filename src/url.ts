import type { SyncBridge } from './bridge/bridge.js';
import type { BridgedTCPConfig } from './bridge/protocol.js';
import type { SyncTCPProxy } from './bridge/proxy.js';
import { TCP } from './controller.js';
import { ConfigurationError } from './error.js';
import type { OperationMode } from './transport.js';
import type { Endpoint, TCPConfig } from './types.js';

/**
 * Controller options other than the address
 */
export type UrlConfig = Omit<TCPConfig, 'host' | 'port'>;

export type BridgedUrlConfig = Omit<BridgedTCPConfig, 'host' | 'port'>;

/**
 * Parse a `tcp://host:port` URL. IPv6 hosts are written in brackets and
 * returned without them.
 *
 * @throws ConfigurationError on another scheme, a missing host or port
 */
export function parseEndpoint(url: string): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid URL: ${url}`);
  }

  if (parsed.protocol !== 'tcp:') {
    throw new ConfigurationError(`Unsupported scheme '${parsed.protocol.slice(0, -1)}' in ${url}`);
  }

  const host = parsed.hostname.replace(/^\[(.*)\]$/, '$1');
  if (!host) {
    throw new ConfigurationError(`Missing host in ${url}`);
  }
  if (!parsed.port) {
    throw new ConfigurationError(`Missing port in ${url}`);
  }

  return { host, port: Number(parsed.port) };
}

/**
 * Create a client for `url`
 *
 * With `concurrency: 'async'` (the default) this is a plain {@link TCP}
 * controller; with `concurrency: 'sync'` it is a blocking proxy hosted on
 * `bridge`.
 *
 * @example
 * ```typescript
 * const sock = socketForUrl('tcp://localhost:5025', { timeout: 1000 });
 * const blocking = socketForUrl('tcp://localhost:5025', { concurrency: 'sync', bridge });
 * ```
 */
export function socketForUrl(url: string, config?: UrlConfig & { concurrency?: 'async' }): TCP;
export function socketForUrl(
  url: string,
  config: BridgedUrlConfig & { concurrency: 'sync'; bridge: SyncBridge }
): SyncTCPProxy;
export function socketForUrl(
  url: string,
  config: UrlConfig & { concurrency?: OperationMode; bridge?: SyncBridge } = {}
): TCP | SyncTCPProxy {
  const endpoint = parseEndpoint(url);
  const { concurrency = 'async', bridge, ...options } = config;

  switch (concurrency) {
    case 'async':
      return new TCP({ ...options, ...endpoint });
    case 'sync':
      if (!bridge) {
        throw new ConfigurationError(`concurrency 'sync' needs a bridge (${url})`);
      }
      return bridge.proxy({ ...bridgedOptions(options), ...endpoint });
    default:
      throw new ConfigurationError(`Unsupported concurrency '${String(concurrency)}'`);
  }
}

function bridgedOptions(options: UrlConfig): BridgedUrlConfig {
  const { onConnectionMade, onConnectionLost, onEofReceived, logger, ...rest } = options;
  if (onConnectionMade || onConnectionLost || onEofReceived || logger) {
    throw new ConfigurationError('Callbacks and loggers cannot be passed to a bridged controller');
  }
  return rest;
}
