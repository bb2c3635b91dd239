/**
 * Request/Reply Client Example
 *
 * Demonstrates:
 * - Connecting lazily on the first request
 * - Query/answer with writeThenReadLine
 * - Lifecycle callbacks
 * - Transparent reconnection after the server goes away and comes back
 *
 * Start examples/req-rep/server.ts first.
 */

import { TCP } from '../../src/controller.js';
import { ConnectError, TimeoutError } from '../../src/error.js';

async function main(): Promise<void> {
  const sock = new TCP({
    host: 'localhost',
    port: 12345,
    timeout: 1000,
    connectionTimeout: 2000,
    debug: true,
    onConnectionMade: () => console.log('✓ Connected'),
    onEofReceived: () => console.log('✗ Server closed the connection'),
    onConnectionLost: (cause) => console.log('✗ Connection lost:', cause.message),
  });

  for (let i = 0; i < 10; i++) {
    try {
      const reply = await sock.writeThenReadLine('*idn?\n');
      console.log(`← ${reply.toString().trimEnd()} (connection #${sock.connectionCounter})`);
    } catch (error) {
      if (error instanceof ConnectError || error instanceof TimeoutError) {
        console.log(`✗ ${error.message}`);
      } else {
        throw error;
      }
    }
    await new Promise((resolve) => setTimeout(resolve, 500));
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
