/**
 * Stream Client Example
 *
 * Iterates over the lines sent by examples/stream/server.ts until the server
 * closes the connection.
 */

import { TCP } from '../../src/controller.js';

async function main(): Promise<void> {
  const sock = new TCP({ host: 'localhost', port: 12345 });
  sock.on('eof', () => console.log('✓ End of stream'));

  for await (const line of sock) {
    console.log(`← ${line.toString().trimEnd()}`);
  }

  await sock.close();
}

// Run the example
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { main };
