/**
 * Stream Server Example
 *
 * Sends ten numbered lines, one per second, to every client and then closes
 * the connection.
 *
 * Usage: tsx examples/stream/server.ts --port 12345
 */

import net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import { parseArgs } from 'node:util';
import { createLogger } from '../../src/logger.js';

async function stream(socket: net.Socket): Promise<void> {
  for (let i = 0; i < 10 && !socket.destroyed; i++) {
    socket.write(`message ${i}\n`);
    await sleep(1000);
  }
  socket.end();
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      host: { type: 'string', default: '0.0.0.0' },
      port: { type: 'string', short: 'p', default: '12345' },
    },
  });
  const logger = createLogger({ prefix: '[stream]' });

  const server = net.createServer((socket) => {
    logger.info(`client connected from ${socket.remoteAddress}:${socket.remotePort}`);
    socket.on('error', (error: Error) => logger.warn('client failed:', error.message));
    stream(socket).catch((error: unknown) => logger.error('stream failed:', error));
  });

  await new Promise<void>((resolve) => {
    server.listen(Number(values.port), values.host, () => resolve());
  });
  logger.info(`started accepting requests on ${values.host}:${values.port}`);

  process.on('SIGINT', () => server.close(() => process.exit(0)));
}

// Run the example
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { main };
