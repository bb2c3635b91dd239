import { EventEmitter } from 'node:events';
import { ReadEngine, type TerminalCondition } from './engine.js';
import {
  AlreadyOpenError,
  ConfigurationError,
  ConnectionClosedError,
  NotConnectedError,
  TimeoutError,
  isConnectionError,
} from './error.js';
import { type Logger, resolveLogger, summarize } from './logger.js';
import { formatAddress } from './socket.js';
import type { ConnectionStatus, LineTransport } from './transport.js';
import type {
  CallOptions,
  Callback,
  Data,
  Endpoint,
  LineOptions,
  OpenOptions,
  ReadUntilOptions,
  TCPConfig,
} from './types.js';
import { OperationQueue } from './utils/serialize.js';

/**
 * Convert outgoing data to bytes (strings are UTF-8 encoded)
 */
export function toBytes(data: Data): Buffer {
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8');
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

type Operation<T> = (engine: ReadEngine, signal: AbortSignal) => Promise<T>;

/**
 * TCP request/reply client
 *
 * Owns at most one {@link ReadEngine} at a time and drives it through a small
 * state machine:
 *
 * - **Closed** → `open()` → **Open**: a fresh engine connects (bounded by
 *   `connectionTimeout`), `connectionCounter` goes up and `onConnectionMade`
 *   runs.
 * - **Open** → peer EOF → **Closed**: `onEofReceived` runs.
 * - **Open** → I/O error → **Closed**: `onConnectionLost(cause)` runs.
 * - **Open** → `close()` → **Closed**.
 *
 * Every data operation goes through one guard that reconnects when needed
 * (with `autoReconnect`), applies the per-call timeout and, on a
 * connection-level error, drops the engine before rethrowing so the next call
 * starts on a new connection. A {@link TimeoutError} never drops the
 * connection: bytes of the abandoned reply may still arrive, use
 * `readAvailable()` or `reset()` to drain them.
 *
 * Concurrent read-family calls on one controller are the caller's problem
 * unless `exclusive` is set, which runs public operations one at a time.
 *
 * @example
 * ```typescript
 * import { TCP } from 'sockline';
 *
 * const sock = new TCP({ host: 'localhost', port: 5025, timeout: 1000 });
 *
 * const idn = await sock.writeThenReadLine('*idn?\n');
 * console.log(idn.toString()); // ACME, bla ble ble, 1234, 5678
 *
 * for await (const line of sock) {
 *   console.log(line.toString());
 * }
 * ```
 *
 * @fires connected - After every successful open
 * @fires disconnected - When the connection breaks on an I/O error (cause)
 * @fires eof - When the peer closes the stream
 */
export class TCP
  extends EventEmitter
  implements LineTransport<'async'>, ConnectionStatus<'sync'>, AsyncIterable<Buffer>
{
  readonly host: string;
  readonly port: number;
  readonly eol: Buffer;
  readonly autoReconnect: boolean;
  timeout: number | undefined;
  connectionTimeout: number | undefined;

  private connections = 0;
  private engine: ReadEngine | null = null;
  private opening: Promise<ReadEngine> | null = null;
  private readonly queue: OperationQueue | null;
  private readonly config: TCPConfig;
  private readonly logger: Logger;

  /**
   * Create a controller. Nothing connects until `open()` or the first
   * operation.
   *
   * @throws ConfigurationError on invalid options
   */
  constructor(config: TCPConfig) {
    super();

    validateConfig(config);

    this.config = config;
    this.host = config.host;
    this.port = config.port;
    this.eol = toBytes(config.eol ?? '\n');
    this.autoReconnect = config.autoReconnect ?? true;
    this.timeout = config.timeout;
    this.connectionTimeout = config.connectionTimeout;
    this.queue = config.exclusive ? new OperationQueue() : null;
    this.logger = resolveLogger(config, `[sockline] ${this.toString()}`);
  }

  /**
   * Number of successful opens so far. Never decreases.
   */
  get connectionCounter(): number {
    return this.connections;
  }

  get endpoint(): Endpoint {
    return { host: this.host, port: this.port };
  }

  toString(): string {
    return `TCP(${formatAddress(this.endpoint)})`;
  }

  connected(): boolean {
    return this.engine?.connected ?? false;
  }

  inWaiting(): number {
    return this.engine?.inWaiting ?? 0;
  }

  /**
   * Return and clear whatever is buffered (possibly empty), without waiting
   */
  readAvailable(): Buffer {
    return this.engine?.readAvailable() ?? Buffer.alloc(0);
  }

  /**
   * Discard buffered bytes, e.g. the late reply of a timed-out call
   */
  reset(): void {
    this.engine?.reset();
  }

  /**
   * Connect to the endpoint
   *
   * @param options.timeout - Overrides `connectionTimeout` for this call
   * @throws AlreadyOpenError if connected or a connect is in flight
   * @throws ConnectError if the handshake fails or times out
   */
  async open(options: OpenOptions = {}): Promise<void> {
    if (this.connected() || this.opening) {
      throw new AlreadyOpenError(`${this.toString()} already open. Must close it first`);
    }
    await this.connect(options.timeout ?? this.connectionTimeout);
  }

  /**
   * Close the connection. Readers suspended on it fail with a
   * "closed while waiting" {@link ConnectionClosedError}.
   */
  async close(): Promise<void> {
    const opening = this.opening;
    if (opening) {
      await opening.then(
        () => undefined,
        (error: unknown) => this.logger.debug('connect attempt failed while closing:', error)
      );
    }

    const engine = this.engine;
    if (!engine) {
      return;
    }
    this.engine = null;
    await engine.close();
    this.logger.debug('connection closed');
  }

  /**
   * `n < 0` (default): read until EOF. Otherwise return up to `n` bytes,
   * waiting only if nothing is buffered.
   */
  async read(n = -1, options?: CallOptions): Promise<Buffer> {
    return this.execute('read', [n], options, (engine, signal) => engine.read(n, signal));
  }

  async readLine(options?: LineOptions): Promise<Buffer> {
    const eol = this.lineTerminator(options);
    return this.execute('readLine', [], options, (engine, signal) => engine.readLine(eol, signal));
  }

  async readLines(n: number, options?: LineOptions): Promise<Buffer[]> {
    const eol = this.lineTerminator(options);
    return this.execute('readLines', [n], options, (engine, signal) =>
      engine.readLines(n, eol, signal)
    );
  }

  async readExactly(n: number, options?: CallOptions): Promise<Buffer> {
    return this.execute('readExactly', [n], options, (engine, signal) =>
      engine.readExactly(n, signal)
    );
  }

  /**
   * Read up to `separator`, kept in the result unless `strip` is set
   */
  async readUntil(separator: Data = '\n', options?: ReadUntilOptions): Promise<Buffer> {
    const bytes = toBytes(separator);
    if (bytes.length === 0) {
      throw new ConfigurationError('readUntil separator must not be empty');
    }
    return this.execute('readUntil', [separator], options, (engine, signal) =>
      engine.readUntil(bytes, options?.strip ?? false, signal)
    );
  }

  async write(data: Data, options?: CallOptions): Promise<void> {
    const bytes = toBytes(data);
    return this.execute('write', [data], options, (engine, signal) => engine.write(bytes, signal));
  }

  async writeLines(lines: Data[], options?: CallOptions): Promise<void> {
    const bytes = Buffer.concat(lines.map(toBytes));
    return this.execute('writeLines', [lines], options, (engine, signal) =>
      engine.write(bytes, signal)
    );
  }

  /**
   * Send `data` and read the one-line reply, as a single operation
   */
  async writeThenReadLine(data: Data, options?: LineOptions): Promise<Buffer> {
    const bytes = toBytes(data);
    const eol = this.lineTerminator(options);
    return this.execute('writeThenReadLine', [data], options, async (engine, signal) => {
      await engine.write(bytes, signal);
      return engine.readLine(eol, signal);
    });
  }

  async writeThenReadLines(data: Data, n: number, options?: LineOptions): Promise<Buffer[]> {
    const bytes = toBytes(data);
    const eol = this.lineTerminator(options);
    return this.execute('writeThenReadLines', [data, n], options, async (engine, signal) => {
      await engine.write(bytes, signal);
      return engine.readLines(n, eol, signal);
    });
  }

  async writeLinesThenReadLines(
    lines: Data[],
    n: number = lines.length,
    options?: LineOptions
  ): Promise<Buffer[]> {
    const bytes = Buffer.concat(lines.map(toBytes));
    const eol = this.lineTerminator(options);
    return this.execute('writeLinesThenReadLines', [lines, n], options, async (engine, signal) => {
      await engine.write(bytes, signal);
      return engine.readLines(n, eol, signal);
    });
  }

  /**
   * Lazy sequence of lines from the current connection.
   *
   * Ends (without error) when the stream closes; any other failure is thrown
   * from the sequence. It never reconnects midway: a new connection needs a
   * new iteration.
   */
  async *lines(options?: LineOptions): AsyncGenerator<Buffer, void, undefined> {
    const eol = this.lineTerminator(options);
    const engine = await this.ensureConnected();

    for (;;) {
      let line: Buffer;
      try {
        line = await this.execute(
          'readLine',
          [],
          options,
          (current, signal) => current.readLine(eol, signal),
          async () => engine
        );
      } catch (error) {
        if (error instanceof ConnectionClosedError) {
          return;
        }
        throw error;
      }
      yield line;
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<Buffer, void, undefined> {
    return this.lines();
  }

  private lineTerminator(options?: LineOptions): Buffer {
    if (options?.eol === undefined) {
      return this.eol;
    }
    const eol = toBytes(options.eol);
    if (eol.length === 0) {
      throw new ConfigurationError('eol must not be empty');
    }
    return eol;
  }

  /**
   * Run one public operation: serialize (if exclusive), connect, time-bound
   * and clean up after connection-level failures.
   */
  private execute<T>(
    name: string,
    args: unknown[],
    options: CallOptions | undefined,
    operation: Operation<T>,
    acquire: () => Promise<ReadEngine> = () => this.ensureConnected()
  ): Promise<T> {
    const run = () => this.perform(name, args, options, operation, acquire);
    return this.queue ? this.queue.run(run) : run();
  }

  private async perform<T>(
    name: string,
    args: unknown[],
    options: CallOptions | undefined,
    operation: Operation<T>,
    acquire: () => Promise<ReadEngine>
  ): Promise<T> {
    this.logger.debug(`[I] ${name} (${args.map(summarize).join(', ')})`);

    const engine = await acquire();
    const timeout = options?.timeout ?? this.timeout;
    const abort = new AbortController();
    const external = options?.signal;

    const timer =
      timeout === undefined
        ? undefined
        : setTimeout(() => {
            abort.abort(TimeoutError.call(name, formatAddress(this.endpoint), timeout));
          }, timeout);

    const onAbort = () => abort.abort(external?.reason);
    if (external?.aborted) {
      onAbort();
    } else {
      external?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const result = await operation(engine, abort.signal);
      this.logger.debug(`[O] ${name}`, result === undefined ? '' : summarize(result));
      return result;
    } catch (error) {
      if (isConnectionError(error)) {
        await this.teardown(engine);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * The guard at the top of every data operation
   */
  private async ensureConnected(): Promise<ReadEngine> {
    if (this.opening) {
      return this.opening;
    }
    const engine = this.engine;
    if (engine?.connected) {
      return engine;
    }
    if (!this.autoReconnect) {
      throw new NotConnectedError(`${this.toString()} not connected`);
    }
    return this.connect(this.connectionTimeout);
  }

  private connect(timeout: number | undefined): Promise<ReadEngine> {
    const attempt = this.establish(timeout).finally(() => {
      this.opening = null;
    });
    this.opening = attempt;
    return attempt;
  }

  private async establish(timeout: number | undefined): Promise<ReadEngine> {
    // The previous engine's receive loop has ended; release it first
    const stale = this.engine;
    if (stale) {
      this.engine = null;
      await stale.close();
    }

    this.logger.debug(`open connection (#${this.connections})`);

    const engine: ReadEngine = new ReadEngine(this.endpoint, {
      noDelay: this.config.noDelay,
      tos: this.config.tos,
      keepAlive: this.config.keepAlive,
      limit: this.config.limit,
      logger: this.logger,
      onTerminal: (condition) => this.handleTerminal(engine, condition),
    });
    await engine.open({ timeout });

    this.engine = engine;
    this.connections++;
    this.emit('connected');
    await this.runCallback('onConnectionMade', this.config.onConnectionMade);
    return engine;
  }

  private async handleTerminal(engine: ReadEngine, condition: TerminalCondition): Promise<void> {
    if (engine !== this.engine) {
      return;
    }
    if (condition.kind === 'eof') {
      this.logger.debug('eof received');
      this.emit('eof');
      await this.runCallback('onEofReceived', this.config.onEofReceived);
    } else {
      this.logger.debug('connection lost:', condition.cause.message);
      this.emit('disconnected', condition.cause);
      await this.runCallback('onConnectionLost', this.config.onConnectionLost, condition.cause);
    }
  }

  private async teardown(engine: ReadEngine): Promise<void> {
    if (this.engine === engine) {
      this.engine = null;
    }
    await engine.settled();
    await engine.close();
  }

  private async runCallback<Args extends unknown[]>(
    name: string,
    callback: Callback<Args> | undefined,
    ...args: Args
  ): Promise<void> {
    if (!callback) {
      return;
    }
    try {
      await callback(...args);
    } catch (error) {
      this.logger.error(`Error in ${name} callback:`, error);
    }
  }
}

/**
 * @throws ConfigurationError on the first invalid option
 */
export function validateConfig(config: Omit<TCPConfig, 'logger'>): void {
  if (typeof config.host !== 'string' || config.host.length === 0) {
    throw new ConfigurationError('host must be a non-empty string');
  }
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new ConfigurationError(`Invalid port: ${config.port}`);
  }
  for (const key of ['timeout', 'connectionTimeout'] as const) {
    const value = config[key];
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      throw new ConfigurationError(`${key} must be a non-negative number of milliseconds`);
    }
  }
  if (config.limit !== undefined && (!Number.isInteger(config.limit) || config.limit <= 0)) {
    throw new ConfigurationError('limit must be a positive integer');
  }
  if (config.eol !== undefined && toBytes(config.eol).length === 0) {
    throw new ConfigurationError('eol must not be empty');
  }
}
