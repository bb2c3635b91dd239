import { once } from 'node:events';
import { createRequire } from 'node:module';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { MessageChannel, Worker } from 'node:worker_threads';
import { validateConfig } from '../controller.js';
import { ConfigurationError } from '../error.js';
import { type Logger, resolveLogger } from '../logger.js';
import { formatAddress } from '../socket.js';
import { parseEndpoint } from '../url.js';
import {
  BRIDGE_STARTING,
  BRIDGE_STOPPED,
  type BridgedTCPConfig,
  type ControlMessage,
  type ProxyHandle,
  type SchedulerData,
} from './protocol.js';
import { type AsyncTCPProxy, type ProxyOptions, type SyncTCPProxy, attachProxy } from './proxy.js';

/**
 * SyncBridge configuration
 */
export interface SyncBridgeOptions {
  /**
   * Length of one blocking wait slice of sync proxies, in milliseconds;
   * liveness of the bridge thread is re-checked between slices
   * @default 100
   */
  bridgeTimeout?: number;

  /**
   * How long `stop()` lets the thread shut down before terminating it
   * @default 2000
   */
  stopTimeout?: number;

  /**
   * Extra Node.js options for the bridge thread
   */
  execArgv?: string[];

  /**
   * Enable debug logging (also on the bridge thread)
   * @default false
   */
  debug?: boolean;

  logger?: Logger;
}

/**
 * Source of the bridge thread bootstrap. It marks the bridge dead on exit
 * even when the entry module fails to load, then imports the entry module,
 * registering the TypeScript loader first when running from sources.
 */
function bootstrap(entry: URL): string {
  const lines = [
    "const { workerData } = require('node:worker_threads');",
    `process.on('exit', () => { Atomics.store(workerData.state, 0, ${BRIDGE_STOPPED}); Atomics.notify(workerData.state, 0); });`,
  ];

  if (entry.pathname.endsWith('.ts')) {
    const api = pathToFileURL(
      createRequire(fileURLToPath(import.meta.url)).resolve('tsx/esm/api')
    ).href;
    lines.push(
      `import(${JSON.stringify(api)})`,
      '  .then(({ register }) => register())',
      `  .then(() => import(${JSON.stringify(entry.href)}))`,
      '  .catch((error) => { console.error(error); process.exit(1); });'
    );
  } else {
    lines.push(
      `import(${JSON.stringify(entry.href)})`,
      '  .catch((error) => { console.error(error); process.exit(1); });'
    );
  }
  return lines.join('\n');
}

/**
 * Hosts controllers on one dedicated scheduler thread and hands out proxies
 * that drive them from any thread.
 *
 * The thread starts on the first `proxy()` call and never keeps the process
 * alive by itself. After `stop()` every proxy of that generation fails with
 * {@link BridgeDeadError}; a later `proxy()` starts a fresh thread.
 *
 * @example
 * ```typescript
 * const bridge = new SyncBridge();
 *
 * const sock = bridge.proxy('tcp://localhost:5025');
 * console.log(sock.writeThenReadLine('*idn?\n').toString());
 *
 * const remote = bridge.proxy({ host: 'localhost', port: 5026 }, { mode: 'async' });
 * console.log((await remote.readLine()).toString());
 *
 * await bridge.stop();
 * ```
 */
export class SyncBridge {
  private worker: Worker | null = null;
  private state: Int32Array | null = null;
  private nextId = 0;
  private readonly logger: Logger;

  constructor(private readonly options: SyncBridgeOptions = {}) {
    const { bridgeTimeout, stopTimeout } = options;
    if (bridgeTimeout !== undefined && !(bridgeTimeout > 0)) {
      throw new ConfigurationError('bridgeTimeout must be a positive number of milliseconds');
    }
    if (stopTimeout !== undefined && !(stopTimeout >= 0)) {
      throw new ConfigurationError('stopTimeout must be a non-negative number of milliseconds');
    }
    this.logger = resolveLogger(options, '[sockline] SyncBridge');
  }

  /**
   * True while the scheduler thread is starting or running
   */
  get running(): boolean {
    return this.state !== null && Atomics.load(this.state, 0) !== BRIDGE_STOPPED;
  }

  /**
   * Host a new controller on the bridge thread and return a proxy to it
   *
   * @param config - Controller configuration, or a `tcp://host:port` URL
   * @throws ConfigurationError on invalid configuration
   */
  proxy(config: BridgedTCPConfig | string, options?: { mode?: 'sync' }): SyncTCPProxy;
  proxy(config: BridgedTCPConfig | string, options: { mode: 'async' }): AsyncTCPProxy;
  proxy(
    config: BridgedTCPConfig | string,
    options: ProxyOptions = {}
  ): SyncTCPProxy | AsyncTCPProxy {
    const resolved = typeof config === 'string' ? parseEndpoint(config) : config;
    validateConfig(resolved);

    const handle = this.attach(++this.nextId, formatAddress(resolved), resolved);
    this.logger.debug(`proxy #${handle.id} for ${handle.address} (${options.mode ?? 'sync'})`);
    return options.mode === 'async' ? attachProxy(handle, { mode: 'async' }) : attachProxy(handle);
  }

  /**
   * A new handle to the controller behind `proxy`, for use from another
   * thread. Pass `handle.calls` and `handle.events` in the transfer list.
   *
   * @throws ConfigurationError if `proxy` belongs to another bridge
   */
  share(proxy: SyncTCPProxy | AsyncTCPProxy): ProxyHandle {
    const state = this.state;
    if (!state || !proxy.belongsTo(state)) {
      throw new ConfigurationError(`${proxy.toString()} does not belong to this bridge`);
    }
    return this.attach(proxy.id, proxy.address);
  }

  /**
   * Close every hosted controller and stop the bridge thread
   */
  async stop(): Promise<void> {
    const worker = this.worker;
    if (!worker) {
      return;
    }
    this.worker = null;

    const exited = once(worker, 'exit');
    const shutdown: ControlMessage = { type: 'shutdown' };
    worker.postMessage(shutdown);

    const timer = setTimeout(() => {
      this.logger.warn('bridge thread did not stop in time, terminating');
      worker.terminate().catch((error: unknown) => this.logger.error('terminate failed:', error));
    }, this.options.stopTimeout ?? 2000);

    try {
      await exited;
    } finally {
      clearTimeout(timer);
      this.markStopped();
    }
    this.logger.debug('bridge stopped');
  }

  private attach(id: number, address: string, config?: BridgedTCPConfig): ProxyHandle {
    const { worker, state } = this.start();
    const calls = new MessageChannel();
    const events = new MessageChannel();

    const attach: ControlMessage = {
      type: 'attach',
      id,
      config,
      calls: calls.port2,
      events: events.port2,
    };
    worker.postMessage(attach, [calls.port2, events.port2]);

    return {
      id,
      address,
      calls: calls.port1,
      events: events.port1,
      state,
      bridgeTimeout: this.options.bridgeTimeout,
    };
  }

  private start(): { worker: Worker; state: Int32Array } {
    if (this.worker && this.state && this.running) {
      return { worker: this.worker, state: this.state };
    }

    const state = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    Atomics.store(state, 0, BRIDGE_STARTING);

    const entry = new URL(
      import.meta.url.endsWith('.ts') ? './worker.ts' : './worker.js',
      import.meta.url
    );
    const workerData: SchedulerData = { state, debug: this.options.debug ?? false };
    const worker = new Worker(bootstrap(entry), {
      eval: true,
      workerData,
      execArgv: this.options.execArgv,
    });

    worker.on('error', (error: Error) => {
      this.logger.error('bridge thread failed:', error);
    });
    worker.on('exit', (code: number) => {
      this.logger.debug(`bridge thread exited with code ${code}`);
      Atomics.store(state, 0, BRIDGE_STOPPED);
      Atomics.notify(state, 0);
      if (this.worker === worker) {
        this.worker = null;
      }
    });
    worker.unref();

    this.worker = worker;
    this.state = state;
    this.logger.debug('bridge thread started');
    return { worker, state };
  }

  private markStopped(): void {
    if (this.state) {
      Atomics.store(this.state, 0, BRIDGE_STOPPED);
      Atomics.notify(this.state, 0);
    }
  }
}
