/**
 * Request/Reply Server Example
 *
 * A minimal instrument-like peer:
 * - `*idn?` is answered with an identification string
 * - anything else is answered with `ERROR: unknown command`
 *
 * Usage: tsx examples/req-rep/server.ts --port 12345 [--debug]
 */

import net from 'node:net';
import { parseArgs } from 'node:util';
import { createLogger } from '../../src/logger.js';

const IDN_REPLY = 'ACME, bla ble ble, 1234, 5678\n';
const UNKNOWN_REPLY = 'ERROR: unknown command\n';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      host: { type: 'string', default: '0.0.0.0' },
      port: { type: 'string', short: 'p', default: '12345' },
      debug: { type: 'boolean', short: 'd', default: false },
    },
  });
  const logger = createLogger({ level: values.debug ? 'debug' : 'info', prefix: '[req-rep]' });

  const server = net.createServer((socket) => {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    logger.info(`client connected from ${peer}`);

    let pending = '';
    socket.on('data', (chunk: Buffer) => {
      pending += chunk.toString();
      let index = pending.indexOf('\n');
      while (index !== -1) {
        const line = pending.slice(0, index + 1);
        pending = pending.slice(index + 1);
        logger.debug('recv', JSON.stringify(line));

        const reply = line.toLowerCase() === '*idn?\n' ? IDN_REPLY : UNKNOWN_REPLY;
        logger.debug('send', JSON.stringify(reply));
        socket.write(reply);
        index = pending.indexOf('\n');
      }
    });
    socket.on('error', (error: Error) => logger.warn(`client ${peer} failed:`, error.message));
    socket.on('close', () => logger.info(`client ${peer} disconnected`));
  });

  await new Promise<void>((resolve) => {
    server.listen(Number(values.port), values.host, () => resolve());
  });
  logger.info(`started accepting requests on ${values.host}:${values.port}`);

  const shutdown = () => {
    logger.info('Ctrl-C pressed. Bailing out!');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Run the example
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { main };
