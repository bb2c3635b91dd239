import type { Socket } from 'node:net';
import { ByteBuffer } from './buffer.js';
import { ConnectError, ConnectionClosedError, ConnectionLostError } from './error.js';
import { type Logger, noopLogger, summarize } from './logger.js';
import { formatAddress, openConnection } from './socket.js';
import { DEFAULT_LIMIT, type Endpoint, type SocketOptions } from './types.js';
import { WakeSignal } from './utils/signal.js';

/**
 * Permanent end state of one connection's receive loop
 */
export type TerminalCondition = { kind: 'eof' } | { kind: 'error'; cause: Error };

/**
 * ReadEngine configuration
 */
export interface ReadEngineOptions extends SocketOptions {
  /**
   * Receive high-water mark in bytes
   * @default 1 MiB
   */
  limit?: number;

  logger?: Logger;

  /**
   * Called once when the receive loop stops on EOF or on an I/O error.
   * Not called when the engine is closed locally.
   */
  onTerminal?: (condition: TerminalCondition) => void | Promise<void>;
}

/**
 * Owns one live TCP stream and turns it into framed reads
 *
 * The receive loop is the socket's `data`/`end`/`error` listeners: each chunk
 * is appended to the {@link ByteBuffer} and raises the level-triggered
 * `dataAvailable` signal; EOF or an error is recorded once as the terminal
 * condition. The loop never restarts: reconnecting means a new engine.
 *
 * At most one read-family call may be outstanding at a time. Every
 * suspending read accepts an `AbortSignal` and rejects with its reason.
 *
 * @example
 * ```typescript
 * const engine = new ReadEngine({ host: 'localhost', port: 5025 });
 * await engine.open();
 * await engine.write(Buffer.from('*idn?\n'));
 * const reply = await engine.readLine(Buffer.from('\n'));
 * await engine.close();
 * ```
 */
export class ReadEngine {
  readonly buffer = new ByteBuffer();
  readonly address: string;

  private socket: Socket | null = null;
  private terminal: TerminalCondition | null = null;
  private closed = false;
  private paused = false;
  private waiting = 0;
  private readonly dataAvailable = new WakeSignal();
  private readonly limit: number;
  private readonly logger: Logger;
  private terminalHandled: Promise<void> = Promise.resolve();

  constructor(
    readonly endpoint: Endpoint,
    private readonly options: ReadEngineOptions = {}
  ) {
    this.address = formatAddress(endpoint);
    this.limit = options.limit ?? DEFAULT_LIMIT;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * True while the stream is open and the receive loop is running
   */
  get connected(): boolean {
    return this.socket !== null && !this.closed && this.terminal === null;
  }

  /**
   * EOF or error recorded by the receive loop, if any
   */
  get terminalCondition(): TerminalCondition | null {
    return this.terminal;
  }

  /**
   * Number of buffered unread bytes
   */
  get inWaiting(): number {
    return this.buffer.length;
  }

  /**
   * Establish the stream and start the receive loop.
   *
   * @param options.timeout - Connect budget in milliseconds
   * @throws ConnectError
   */
  async open(options: { timeout?: number } = {}): Promise<void> {
    if (this.socket || this.closed) {
      throw new ConnectError(`Engine for ${this.address} already used; create a new one`);
    }

    const socket = await openConnection(
      this.endpoint,
      { ...this.options, timeout: options.timeout },
      this.logger
    );

    if (this.closed) {
      socket.destroy();
      throw new ConnectError(`Engine for ${this.address} closed during connect`);
    }

    this.socket = socket;
    this.startReceiveLoop(socket);
  }

  /**
   * Resolves once the terminal hook (if any) has finished running
   */
  settled(): Promise<void> {
    return this.terminalHandled;
  }

  /**
   * Suspend until new data or a terminal condition arrives.
   *
   * Bytes that arrive together with EOF or an error are returned first; the
   * terminal condition is raised by the next wait that finds no new data.
   *
   * @throws ConnectionClosedError on EOF or after a local close
   * @throws ConnectionLostError if the receive loop failed
   */
  async waitForData(signal?: AbortSignal): Promise<void> {
    this.throwIfTerminal();

    const buffered = this.buffer.length;
    // A waiting reader needs more than what is buffered
    this.resumeReceiving();

    this.waiting++;
    try {
      await this.dataAvailable.wait(signal);
    } finally {
      this.waiting--;
    }
    this.dataAvailable.clear();

    if (this.closed || this.buffer.length <= buffered) {
      this.throwIfTerminal();
    }
  }

  /**
   * Read one line, terminator included
   */
  readLine(eol: Uint8Array, signal?: AbortSignal): Promise<Buffer> {
    return this.readUntil(eol, false, signal);
  }

  /**
   * Read `n` consecutive lines
   */
  async readLines(n: number, eol: Uint8Array, signal?: AbortSignal): Promise<Buffer[]> {
    const lines: Buffer[] = [];
    for (let i = 0; i < n; i++) {
      lines.push(await this.readLine(eol, signal));
    }
    return lines;
  }

  /**
   * Read up to and including `separator`
   *
   * @param strip - Drop the separator from the result
   */
  async readUntil(separator: Uint8Array, strip = false, signal?: AbortSignal): Promise<Buffer> {
    let offset = this.buffer.findTerminator(separator);

    while (offset === -1) {
      const scanned = this.buffer.length;
      await this.waitForData(signal);

      // Only rescan the tail that could complete a match
      const from = this.buffer.length >= scanned ? scanned - separator.length + 1 : 0;
      offset = this.buffer.findTerminator(separator, from);
    }

    const chunk = this.consume(offset + separator.length);
    return strip ? chunk.subarray(0, offset) : chunk;
  }

  /**
   * Read exactly `n` bytes
   */
  async readExactly(n: number, signal?: AbortSignal): Promise<Buffer> {
    while (this.buffer.length < n) {
      await this.waitForData(signal);
    }
    return this.consume(n);
  }

  /**
   * `n < 0`: read until EOF and return everything.
   * Otherwise wait for at least one byte and return up to `n` bytes.
   */
  async read(n = -1, signal?: AbortSignal): Promise<Buffer> {
    if (n < 0) {
      for (;;) {
        try {
          await this.waitForData(signal);
        } catch (error) {
          if (error instanceof ConnectionClosedError && error.reason === 'eof') {
            return this.consume(this.buffer.length);
          }
          throw error;
        }
      }
    }

    if (n === 0) {
      return Buffer.alloc(0);
    }
    if (this.buffer.length === 0) {
      await this.waitForData(signal);
    }
    return this.consume(Math.min(n, this.buffer.length));
  }

  /**
   * Return and clear whatever is buffered, without suspending
   */
  readAvailable(): Buffer {
    return this.consume(this.buffer.length);
  }

  /**
   * Discard buffered bytes; the terminal condition is kept
   */
  reset(): void {
    this.buffer.reset();
    this.resumeReceiving();
  }

  /**
   * Send all of `data`. Resolves once it has been handed to the OS.
   *
   * @throws ConnectionLostError if the send fails
   */
  write(data: Uint8Array, signal?: AbortSignal): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(ConnectionClosedError.whileWaiting(this.address));
    }
    try {
      this.throwIfTerminal();
    } catch (error) {
      return Promise.reject(error);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(signal?.reason);
      signal?.addEventListener('abort', onAbort, { once: true });

      socket.write(data, (error) => {
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(ConnectionLostError.fromCause(this.address, error));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Stop the receive loop and release the stream. Suspended readers are woken
   * with a "closed while waiting" error. Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.dataAvailable.set();

    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return;
    }

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }

  private startReceiveLoop(socket: Socket): void {
    socket.on('data', (chunk: Buffer) => {
      if (this.closed) {
        return;
      }
      this.logger.trace('received', summarize(chunk));
      this.buffer.append(chunk);
      this.pauseIfFull();
      this.dataAvailable.set();
    });

    socket.on('end', () => {
      this.terminate({ kind: 'eof' });
    });

    socket.on('error', (error: Error) => {
      this.terminate({ kind: 'error', cause: error });
    });

    socket.on('close', () => {
      this.terminate({ kind: 'eof' });
    });
  }

  private terminate(condition: TerminalCondition): void {
    if (this.terminal || this.closed) {
      return;
    }
    this.terminal = condition;
    this.logger.debug(
      condition.kind === 'eof'
        ? 'receive loop reached eof'
        : `receive loop failed: ${condition.cause.message}`
    );
    this.dataAvailable.set();
    this.terminalHandled = this.runTerminalHook(condition);
  }

  private async runTerminalHook(condition: TerminalCondition): Promise<void> {
    const hook = this.options.onTerminal;
    if (!hook) {
      return;
    }
    try {
      await hook(condition);
    } catch (error) {
      this.logger.error('Error in terminal hook:', error);
    }
  }

  private throwIfTerminal(): void {
    if (this.closed) {
      throw ConnectionClosedError.whileWaiting(this.address);
    }
    const terminal = this.terminal;
    if (terminal?.kind === 'eof') {
      throw ConnectionClosedError.eof(this.address);
    }
    if (terminal?.kind === 'error') {
      throw ConnectionLostError.fromCause(this.address, terminal.cause);
    }
  }

  private consume(n: number): Buffer {
    const chunk = this.buffer.consumeExact(n);
    if (this.buffer.length < this.limit) {
      this.resumeReceiving();
    }
    return chunk;
  }

  private pauseIfFull(): void {
    if (!this.paused && this.waiting === 0 && this.buffer.length >= this.limit) {
      this.logger.debug(`receive buffer full (${this.buffer.length} bytes), pausing`);
      this.paused = true;
      this.socket?.pause();
    }
  }

  private resumeReceiving(): void {
    if (this.paused) {
      this.paused = false;
      this.socket?.resume();
    }
  }
}
