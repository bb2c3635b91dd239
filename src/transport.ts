import type {
  Data,
  LineOptions,
  OpenOptions,
  ReadUntilOptions,
  Remote,
  TimeoutOptions,
} from './types.js';

/**
 * How results are delivered: resolved values (`sync`) or promises (`async`)
 */
export type OperationMode = 'sync' | 'async';

/**
 * `T` as delivered in mode `M`
 */
export type Outcome<T, M extends OperationMode> = M extends 'sync' ? T : Promise<T>;

/**
 * Lazy sequence of lines as delivered in mode `M`
 */
export type LineSequence<M extends OperationMode> = M extends 'sync'
  ? Iterable<Buffer>
  : AsyncIterable<Buffer>;

/**
 * The fixed set of operations of a line/block request-reply connection.
 *
 * Implemented by the {@link TCP} controller itself and, forwarded one method
 * at a time, by both bridge proxies. Nothing is discovered at runtime: adding
 * an operation means adding it here and to each implementation.
 *
 * ## Framing
 *
 * - `readLine` family: up to and including the line terminator (`eol`)
 * - `readExactly`: a fixed-size block
 * - `readUntil`: up to an arbitrary separator, optionally stripped
 * - `read`: whatever arrives (`n < 0`: everything until EOF)
 *
 * ## Connection handling
 *
 * Every data operation first makes sure a connection exists (reopening it
 * when auto-reconnect is on), then runs under the per-call timeout. A timeout
 * leaves the connection open; an EOF or I/O error closes it so the next call
 * can reconnect.
 */
export interface LineTransport<M extends OperationMode = 'async'> {
  /**
   * Connect to the endpoint
   * @throws AlreadyOpenError if already connected
   * @throws ConnectError if the handshake fails or times out
   */
  open(options?: OpenOptions): Outcome<void, M>;

  /**
   * Close the connection; a no-op when already closed
   */
  close(): Outcome<void, M>;

  read(n?: number, options?: Remote<TimeoutOptions>): Outcome<Buffer, M>;

  readLine(options?: Remote<LineOptions>): Outcome<Buffer, M>;

  readLines(n: number, options?: Remote<LineOptions>): Outcome<Buffer[], M>;

  readExactly(n: number, options?: Remote<TimeoutOptions>): Outcome<Buffer, M>;

  readUntil(separator?: Data, options?: Remote<ReadUntilOptions>): Outcome<Buffer, M>;

  write(data: Data, options?: Remote<TimeoutOptions>): Outcome<void, M>;

  writeLines(lines: Data[], options?: Remote<TimeoutOptions>): Outcome<void, M>;

  writeThenReadLine(data: Data, options?: Remote<LineOptions>): Outcome<Buffer, M>;

  writeThenReadLines(data: Data, n: number, options?: Remote<LineOptions>): Outcome<Buffer[], M>;

  /**
   * @param n - Number of reply lines (default: one per request line)
   */
  writeLinesThenReadLines(
    lines: Data[],
    n?: number,
    options?: Remote<LineOptions>
  ): Outcome<Buffer[], M>;

  /**
   * Line iteration; ends cleanly when the peer closes the stream
   */
  lines(options?: Remote<LineOptions>): LineSequence<M>;
}

/**
 * Non-suspending state accessors
 */
export interface ConnectionStatus<M extends OperationMode = 'sync'> {
  /**
   * Number of successful opens so far
   */
  readonly connectionCounter: Outcome<number, M>;

  connected(): Outcome<boolean, M>;

  /**
   * Number of buffered unread bytes
   */
  inWaiting(): Outcome<number, M>;

  /**
   * Return and clear whatever is buffered (possibly empty)
   */
  readAvailable(): Outcome<Buffer, M>;

  /**
   * Discard buffered bytes
   */
  reset(): Outcome<void, M>;
}
