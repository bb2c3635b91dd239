import type { MessagePort } from 'node:worker_threads';
import type { SerializedError } from '../error.js';
import type {
  Data,
  LineOptions,
  OpenOptions,
  ReadUntilOptions,
  Remote,
  TCPConfig,
  TimeoutOptions,
} from '../types.js';

/**
 * Controller configuration that can cross a thread boundary: no callbacks,
 * no logger object
 */
export type BridgedTCPConfig = Omit<
  TCPConfig,
  'onConnectionMade' | 'onConnectionLost' | 'onEofReceived' | 'logger'
>;

/**
 * Arguments of every operation a proxy can forward, by name
 */
export interface OperationArgs {
  open: [options?: OpenOptions];
  close: [];
  connected: [];
  connectionCounter: [];
  inWaiting: [];
  readAvailable: [];
  reset: [];
  read: [n?: number, options?: Remote<TimeoutOptions>];
  readLine: [options?: Remote<LineOptions>];
  readLines: [n: number, options?: Remote<LineOptions>];
  readExactly: [n: number, options?: Remote<TimeoutOptions>];
  readUntil: [separator?: Data, options?: Remote<ReadUntilOptions>];
  write: [data: Data, options?: Remote<TimeoutOptions>];
  writeLines: [lines: Data[], options?: Remote<TimeoutOptions>];
  writeThenReadLine: [data: Data, options?: Remote<LineOptions>];
  writeThenReadLines: [data: Data, n: number, options?: Remote<LineOptions>];
  writeLinesThenReadLines: [lines: Data[], n?: number, options?: Remote<LineOptions>];
  iterate: [options?: Remote<LineOptions>];
  next: [iterator: number];
  return: [iterator: number];
}

export type OperationName = keyof OperationArgs;

export const OPERATION_NAMES: readonly OperationName[] = [
  'open',
  'close',
  'connected',
  'connectionCounter',
  'inWaiting',
  'readAvailable',
  'reset',
  'read',
  'readLine',
  'readLines',
  'readExactly',
  'readUntil',
  'write',
  'writeLines',
  'writeThenReadLine',
  'writeThenReadLines',
  'writeLinesThenReadLines',
  'iterate',
  'next',
  'return',
];

/** One step of a remote line iterator */
export interface IteratorStep {
  done: boolean;
  value?: Uint8Array;
}

/** Values an operation can return across the thread boundary */
export type WireValue = undefined | boolean | number | Uint8Array | Uint8Array[] | IteratorStep;

/** Call slot states in a sync caller's wake word */
export const SLOT_PENDING = 0;
export const SLOT_DONE = 1;
export const SLOT_DEAD = 2;

/** Scheduler thread states in the bridge-wide state word */
export const BRIDGE_STARTING = 0;
export const BRIDGE_RUNNING = 1;
export const BRIDGE_STOPPED = 2;

/**
 * Caller → scheduler: run one operation.
 *
 * `wake` is set by blocking callers: the scheduler stores {@link SLOT_DONE}
 * and notifies it after posting the result.
 */
export interface CallOf<K extends OperationName> {
  type: 'call';
  callId: number;
  method: K;
  args: OperationArgs[K];
  wake?: Int32Array;
}

export type CallMessage = { [K in OperationName]: CallOf<K> }[OperationName];

/** Scheduler → caller: outcome of one call */
export type ResultMessage =
  | { type: 'result'; callId: number; ok: true; value: WireValue }
  | { type: 'result'; callId: number; ok: false; error: SerializedError };

/** Scheduler → caller: lifecycle event of the hosted controller */
export type EventMessage =
  | { type: 'event'; name: 'connected' | 'eof' }
  | { type: 'event'; name: 'disconnected'; cause: SerializedError };

/**
 * Bridge → scheduler thread control messages
 *
 * `attach` without `config` binds new ports to an existing controller.
 */
export type ControlMessage =
  | {
      type: 'attach';
      id: number;
      config?: BridgedTCPConfig;
      calls: MessagePort;
      events: MessagePort;
    }
  | { type: 'shutdown' };

/**
 * Everything another thread needs to drive an existing hosted controller.
 * Transfer `calls` and `events` in the `transferList` of `postMessage`.
 */
export interface ProxyHandle {
  id: number;
  address: string;
  calls: MessagePort;
  events: MessagePort;
  state: Int32Array;
  bridgeTimeout?: number;
}

/** Data passed to the scheduler thread at startup */
export interface SchedulerData {
  state: Int32Array;
  debug: boolean;
}
