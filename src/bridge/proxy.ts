import { EventEmitter } from 'node:events';
import { type MessagePort, receiveMessageOnPort } from 'node:worker_threads';
import { BridgeDeadError, deserializeError } from '../error.js';
import type { ConnectionStatus, LineTransport, OperationMode } from '../transport.js';
import type {
  Data,
  LineOptions,
  OpenOptions,
  ReadUntilOptions,
  Remote,
  TimeoutOptions,
} from '../types.js';
import { type Deferred, deferred } from '../utils/signal.js';
import {
  isByteArrayList,
  isEventMessage,
  isIteratorStep,
  isResultMessage,
} from '../utils/typeGuards.js';
import {
  BRIDGE_STOPPED,
  type CallOf,
  type IteratorStep,
  type OperationArgs,
  type OperationName,
  type ProxyHandle,
  type ResultMessage,
  SLOT_DEAD,
  SLOT_DONE,
  SLOT_PENDING,
  type WireValue,
} from './protocol.js';

/**
 * Default length of one blocking wait slice, in milliseconds
 */
const DEFAULT_WAIT_SLICE = 100;

export interface ProxyOptions {
  /**
   * `sync` blocks the calling thread until the result arrives; `async`
   * returns promises
   * @default 'sync'
   */
  mode?: OperationMode;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function expectBytes(value: WireValue): Buffer {
  if (value instanceof Uint8Array) {
    return toBuffer(value);
  }
  throw new TypeError('Expected bytes from the bridge thread');
}

function expectBytesList(value: WireValue): Buffer[] {
  if (isByteArrayList(value)) {
    return value.map(toBuffer);
  }
  throw new TypeError('Expected a list of byte arrays from the bridge thread');
}

function expectNumber(value: WireValue): number {
  if (typeof value === 'number') {
    return value;
  }
  throw new TypeError('Expected a number from the bridge thread');
}

function expectBoolean(value: WireValue): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  throw new TypeError('Expected a boolean from the bridge thread');
}

function expectStep(value: WireValue): IteratorStep {
  if (isIteratorStep(value)) {
    return value;
  }
  throw new TypeError('Expected an iterator step from the bridge thread');
}

function unwrap(message: ResultMessage): WireValue {
  if (message.ok) {
    return message.value;
  }
  throw deserializeError(message.error);
}

/**
 * State shared by both proxy flavours: the ports to the hosted controller,
 * liveness and event relay.
 *
 * @fires connected
 * @fires disconnected - with the rebuilt cause
 * @fires eof
 */
abstract class ProxyChannel extends EventEmitter {
  readonly id: number;
  readonly address: string;

  protected readonly calls: MessagePort;
  private readonly events: MessagePort;
  private readonly state: Int32Array;
  private nextCall = 0;
  private detached = false;

  constructor(handle: ProxyHandle) {
    super();
    this.id = handle.id;
    this.address = handle.address;
    this.calls = handle.calls;
    this.events = handle.events;
    this.state = handle.state;

    this.events.on('message', (message: unknown) => this.relay(message));
    this.events.unref();
  }

  /**
   * False once the bridge thread has stopped or this proxy was detached
   */
  get alive(): boolean {
    return !this.detached && Atomics.load(this.state, 0) !== BRIDGE_STOPPED;
  }

  toString(): string {
    return `${this.constructor.name}(${this.address})`;
  }

  /**
   * Whether this proxy talks to the bridge owning `state`
   */
  belongsTo(state: Int32Array): boolean {
    return this.state.buffer === state.buffer;
  }

  /**
   * Release this proxy's ports. The hosted controller is closed once no
   * proxy is attached to it anymore.
   */
  detach(): void {
    if (this.detached) {
      return;
    }
    this.detached = true;
    this.calls.close();
    this.events.close();
  }

  protected deadError(method: string): BridgeDeadError {
    return new BridgeDeadError(`Bridge unavailable for ${method} on ${this.address}`);
  }

  protected call<K extends OperationName>(method: K, args: OperationArgs[K]): CallOf<K> {
    return { type: 'call', callId: ++this.nextCall, method, args };
  }

  private relay(message: unknown): void {
    if (!isEventMessage(message)) {
      return;
    }
    if (message.name === 'disconnected') {
      this.emit('disconnected', deserializeError(message.cause));
    } else {
      this.emit(message.name);
    }
  }
}

/**
 * Blocking proxy: every call suspends the calling thread until the bridge
 * thread has a result.
 *
 * The caller sleeps on a shared wake word in slices of `bridgeTimeout`
 * milliseconds, checking between slices that the bridge thread is alive,
 * then collects the reply synchronously from its port.
 *
 * @example
 * ```typescript
 * const bridge = new SyncBridge();
 * const sock = bridge.proxy({ host: 'localhost', port: 5025 });
 * const idn = sock.writeThenReadLine('*idn?\n');
 * ```
 */
export class SyncTCPProxy
  extends ProxyChannel
  implements LineTransport<'sync'>, ConnectionStatus<'sync'>, Iterable<Buffer>
{
  private readonly slice: number;

  constructor(handle: ProxyHandle) {
    super(handle);
    this.slice = handle.bridgeTimeout ?? DEFAULT_WAIT_SLICE;
    this.calls.unref();
  }

  get connectionCounter(): number {
    return expectNumber(this.invoke('connectionCounter'));
  }

  open(options?: OpenOptions): void {
    this.invoke('open', options);
  }

  close(): void {
    this.invoke('close');
  }

  connected(): boolean {
    return expectBoolean(this.invoke('connected'));
  }

  inWaiting(): number {
    return expectNumber(this.invoke('inWaiting'));
  }

  readAvailable(): Buffer {
    return expectBytes(this.invoke('readAvailable'));
  }

  reset(): void {
    this.invoke('reset');
  }

  read(n?: number, options?: Remote<TimeoutOptions>): Buffer {
    return expectBytes(this.invoke('read', n, options));
  }

  readLine(options?: Remote<LineOptions>): Buffer {
    return expectBytes(this.invoke('readLine', options));
  }

  readLines(n: number, options?: Remote<LineOptions>): Buffer[] {
    return expectBytesList(this.invoke('readLines', n, options));
  }

  readExactly(n: number, options?: Remote<TimeoutOptions>): Buffer {
    return expectBytes(this.invoke('readExactly', n, options));
  }

  readUntil(separator?: Data, options?: Remote<ReadUntilOptions>): Buffer {
    return expectBytes(this.invoke('readUntil', separator, options));
  }

  write(data: Data, options?: Remote<TimeoutOptions>): void {
    this.invoke('write', data, options);
  }

  writeLines(lines: Data[], options?: Remote<TimeoutOptions>): void {
    this.invoke('writeLines', lines, options);
  }

  writeThenReadLine(data: Data, options?: Remote<LineOptions>): Buffer {
    return expectBytes(this.invoke('writeThenReadLine', data, options));
  }

  writeThenReadLines(data: Data, n: number, options?: Remote<LineOptions>): Buffer[] {
    return expectBytesList(this.invoke('writeThenReadLines', data, n, options));
  }

  writeLinesThenReadLines(lines: Data[], n?: number, options?: Remote<LineOptions>): Buffer[] {
    return expectBytesList(this.invoke('writeLinesThenReadLines', lines, n, options));
  }

  /**
   * Lines pulled one at a time from an iterator kept on the bridge thread
   */
  *lines(options?: Remote<LineOptions>): Generator<Buffer, void, undefined> {
    const iterator = expectNumber(this.invoke('iterate', options));
    let finished = false;
    try {
      for (;;) {
        const step = expectStep(this.invoke('next', iterator));
        if (step.done || !step.value) {
          finished = true;
          return;
        }
        yield toBuffer(step.value);
      }
    } finally {
      if (!finished && this.alive) {
        this.invoke('return', iterator);
      }
    }
  }

  [Symbol.iterator](): Generator<Buffer, void, undefined> {
    return this.lines();
  }

  private invoke<K extends OperationName>(method: K, ...args: OperationArgs[K]): WireValue {
    if (!this.alive) {
      throw this.deadError(method);
    }

    const wake = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const call = { ...this.call(method, args), wake };
    this.calls.postMessage(call);

    for (;;) {
      Atomics.wait(wake, 0, SLOT_PENDING, this.slice);
      const slot = Atomics.load(wake, 0);
      if (slot === SLOT_DONE) {
        break;
      }
      if (slot === SLOT_DEAD || !this.alive) {
        throw this.deadError(method);
      }
    }

    return this.take(call.callId, method);
  }

  private take(callId: number, method: string): WireValue {
    for (;;) {
      const received = receiveMessageOnPort(this.calls);
      if (!received) {
        throw this.deadError(method);
      }
      const message: unknown = received.message;
      if (isResultMessage(message) && message.callId === callId) {
        return unwrap(message);
      }
    }
  }
}

/**
 * Promise-returning proxy; the calling thread keeps running its own event
 * loop while the bridge thread does the I/O.
 */
export class AsyncTCPProxy
  extends ProxyChannel
  implements LineTransport<'async'>, ConnectionStatus<'async'>, AsyncIterable<Buffer>
{
  private readonly pending = new Map<number, Deferred<WireValue>>();

  constructor(handle: ProxyHandle) {
    super(handle);
    this.calls.on('message', (message: unknown) => this.settle(message));
    this.calls.on('close', () => this.failPending());
    this.calls.unref();
  }

  /**
   * Resolves to the hosted controller's connection counter
   */
  get connectionCounter(): Promise<number> {
    return this.invoke('connectionCounter').then(expectNumber);
  }

  async open(options?: OpenOptions): Promise<void> {
    await this.invoke('open', options);
  }

  async close(): Promise<void> {
    await this.invoke('close');
  }

  async connected(): Promise<boolean> {
    return expectBoolean(await this.invoke('connected'));
  }

  async inWaiting(): Promise<number> {
    return expectNumber(await this.invoke('inWaiting'));
  }

  async readAvailable(): Promise<Buffer> {
    return expectBytes(await this.invoke('readAvailable'));
  }

  async reset(): Promise<void> {
    await this.invoke('reset');
  }

  async read(n?: number, options?: Remote<TimeoutOptions>): Promise<Buffer> {
    return expectBytes(await this.invoke('read', n, options));
  }

  async readLine(options?: Remote<LineOptions>): Promise<Buffer> {
    return expectBytes(await this.invoke('readLine', options));
  }

  async readLines(n: number, options?: Remote<LineOptions>): Promise<Buffer[]> {
    return expectBytesList(await this.invoke('readLines', n, options));
  }

  async readExactly(n: number, options?: Remote<TimeoutOptions>): Promise<Buffer> {
    return expectBytes(await this.invoke('readExactly', n, options));
  }

  async readUntil(separator?: Data, options?: Remote<ReadUntilOptions>): Promise<Buffer> {
    return expectBytes(await this.invoke('readUntil', separator, options));
  }

  async write(data: Data, options?: Remote<TimeoutOptions>): Promise<void> {
    await this.invoke('write', data, options);
  }

  async writeLines(lines: Data[], options?: Remote<TimeoutOptions>): Promise<void> {
    await this.invoke('writeLines', lines, options);
  }

  async writeThenReadLine(data: Data, options?: Remote<LineOptions>): Promise<Buffer> {
    return expectBytes(await this.invoke('writeThenReadLine', data, options));
  }

  async writeThenReadLines(
    data: Data,
    n: number,
    options?: Remote<LineOptions>
  ): Promise<Buffer[]> {
    return expectBytesList(await this.invoke('writeThenReadLines', data, n, options));
  }

  async writeLinesThenReadLines(
    lines: Data[],
    n?: number,
    options?: Remote<LineOptions>
  ): Promise<Buffer[]> {
    return expectBytesList(await this.invoke('writeLinesThenReadLines', lines, n, options));
  }

  async *lines(options?: Remote<LineOptions>): AsyncGenerator<Buffer, void, undefined> {
    const iterator = expectNumber(await this.invoke('iterate', options));
    let finished = false;
    try {
      for (;;) {
        const step = expectStep(await this.invoke('next', iterator));
        if (step.done || !step.value) {
          finished = true;
          return;
        }
        yield toBuffer(step.value);
      }
    } finally {
      if (!finished && this.alive) {
        await this.invoke('return', iterator);
      }
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<Buffer, void, undefined> {
    return this.lines();
  }

  private invoke<K extends OperationName>(method: K, ...args: OperationArgs[K]): Promise<WireValue> {
    if (!this.alive) {
      return Promise.reject(this.deadError(method));
    }

    const call = this.call(method, args);
    const result = deferred<WireValue>();
    this.pending.set(call.callId, result);
    // Keep the process alive only while a reply is outstanding
    if (this.pending.size === 1) {
      this.calls.ref();
    }
    this.calls.postMessage(call);
    return result.promise;
  }

  private settle(message: unknown): void {
    if (!isResultMessage(message)) {
      return;
    }
    const result = this.pending.get(message.callId);
    if (!result) {
      return;
    }
    this.pending.delete(message.callId);
    if (this.pending.size === 0) {
      this.calls.unref();
    }

    try {
      result.resolve(unwrap(message));
    } catch (error) {
      result.reject(error);
    }
  }

  private failPending(): void {
    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const result of pending) {
      result.reject(this.deadError('pending call'));
    }
  }
}

/**
 * Build a proxy around a {@link ProxyHandle}, typically one received from
 * another thread after {@link SyncBridge.share}
 */
export function attachProxy(handle: ProxyHandle, options?: { mode?: 'sync' }): SyncTCPProxy;
export function attachProxy(handle: ProxyHandle, options: { mode: 'async' }): AsyncTCPProxy;
export function attachProxy(
  handle: ProxyHandle,
  options: ProxyOptions = {}
): SyncTCPProxy | AsyncTCPProxy {
  return options.mode === 'async' ? new AsyncTCPProxy(handle) : new SyncTCPProxy(handle);
}
