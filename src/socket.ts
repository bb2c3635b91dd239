import net from 'node:net';
import { ConnectError } from './error.js';
import type { Logger } from './logger.js';
import {
  type Endpoint,
  IPTOS_LOWDELAY,
  IPTOS_NORMAL,
  type KeepAliveOptions,
  type SocketOptions,
} from './types.js';

/**
 * `host:port`, with IPv6 hosts in brackets
 */
export function formatAddress(endpoint: Endpoint): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `${host}:${endpoint.port}`;
}

/**
 * Expand the boolean shorthand of the `keepAlive` option
 */
export function normalizeKeepAlive(
  keepAlive: SocketOptions['keepAlive']
): KeepAliveOptions | undefined {
  if (keepAlive === undefined) {
    return undefined;
  }
  if (typeof keepAlive === 'boolean') {
    return { active: keepAlive };
  }
  return keepAlive;
}

/**
 * Apply the low-latency and keep-alive options to a connected socket.
 *
 * Options Node.js cannot set (type of service, keep-alive probe interval
 * and count) are skipped.
 */
export function configureSocket(socket: net.Socket, options: SocketOptions, logger: Logger): void {
  const { noDelay = true, tos = IPTOS_LOWDELAY } = options;

  socket.setNoDelay(noDelay);

  if (tos !== IPTOS_NORMAL) {
    logger.trace(`IP type of service 0x${tos.toString(16)} not supported, skipped`);
  }

  const keepAlive = normalizeKeepAlive(options.keepAlive);
  if (!keepAlive) {
    return;
  }

  if (keepAlive.active !== undefined) {
    socket.setKeepAlive(keepAlive.active, keepAlive.idle ?? 0);
  } else if (keepAlive.idle !== undefined) {
    socket.setKeepAlive(true, keepAlive.idle);
  }

  if (keepAlive.interval !== undefined || keepAlive.retry !== undefined) {
    logger.debug('Keep-alive interval/retry not supported, skipped');
  }
}

/**
 * Open a TCP connection to `endpoint`.
 *
 * @param timeout - Connect budget in milliseconds
 * @throws ConnectError if the handshake fails or does not finish in time
 */
export function openConnection(
  endpoint: Endpoint,
  options: SocketOptions & { timeout?: number },
  logger: Logger
): Promise<net.Socket> {
  const address = formatAddress(endpoint);
  const { timeout } = options;

  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: endpoint.host, port: endpoint.port });
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      clearTimeout(timer);
      socket.off('connect', onConnect);
      socket.off('error', onError);
    };

    const onConnect = () => {
      cleanup();
      configureSocket(socket, options, logger);
      resolve(socket);
    };

    const onError = (error: Error) => {
      cleanup();
      socket.destroy();
      reject(ConnectError.refused(address, error));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);

    if (timeout !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(ConnectError.timeout(address, timeout));
      }, timeout);
    }
  });
}
