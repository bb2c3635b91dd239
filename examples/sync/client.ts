/**
 * Blocking Client Example
 *
 * Drives a controller hosted on the bridge thread with plain, blocking calls,
 * then talks to the same controller through a promise-based proxy.
 *
 * Start examples/req-rep/server.ts first.
 */

import { SyncBridge } from '../../src/bridge/bridge.js';
import { attachProxy } from '../../src/bridge/proxy.js';
import { socketForUrl } from '../../src/url.js';

async function main(): Promise<void> {
  const bridge = new SyncBridge();

  try {
    const sock = socketForUrl('tcp://localhost:12345', { concurrency: 'sync', bridge, timeout: 1000 });
    sock.on('connected', () => console.log('✓ Connected'));

    for (let i = 0; i < 3; i++) {
      console.log(`← ${sock.writeThenReadLine('*idn?\n').toString().trimEnd()}`);
    }
    console.log(`Connections so far: ${sock.connectionCounter}`);

    const remote = attachProxy(bridge.share(sock), { mode: 'async' });
    const reply = await remote.writeThenReadLine('wrong question\n');
    console.log(`← ${reply.toString().trimEnd()}`);
  } finally {
    await bridge.stop();
  }
}

// Run the example
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { main };
