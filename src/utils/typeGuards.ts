import { MessagePort } from 'node:worker_threads';
import {
  type CallMessage,
  type ControlMessage,
  type EventMessage,
  type IteratorStep,
  OPERATION_NAMES,
  type OperationName,
  type ResultMessage,
  type SchedulerData,
} from '../bridge/protocol.js';
import type { SerializedError } from '../error.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isOperationName(value: unknown): value is OperationName {
  return typeof value === 'string' && OPERATION_NAMES.some((name) => name === value);
}

/**
 * Type guard for a serialized error
 * Has: name, message (code optional)
 */
export function isSerializedError(value: unknown): value is SerializedError {
  return isObject(value) && typeof value.name === 'string' && typeof value.message === 'string';
}

/**
 * Type guard for a call sent to the scheduler thread
 * Call has: type 'call', numeric callId, a known method, args array
 */
export function isCallMessage(message: unknown): message is CallMessage {
  return (
    isObject(message) &&
    message.type === 'call' &&
    typeof message.callId === 'number' &&
    isOperationName(message.method) &&
    Array.isArray(message.args) &&
    (message.wake === undefined || message.wake instanceof Int32Array)
  );
}

/**
 * Type guard for the outcome of a call
 * Result has: type 'result', callId, ok flag, and value or error
 */
export function isResultMessage(message: unknown): message is ResultMessage {
  if (!isObject(message) || message.type !== 'result' || typeof message.callId !== 'number') {
    return false;
  }
  if (message.ok === true) {
    return 'value' in message;
  }
  return message.ok === false && isSerializedError(message.error);
}

/**
 * Type guard for a lifecycle event
 */
export function isEventMessage(message: unknown): message is EventMessage {
  if (!isObject(message) || message.type !== 'event') {
    return false;
  }
  if (message.name === 'connected' || message.name === 'eof') {
    return true;
  }
  return message.name === 'disconnected' && isSerializedError(message.cause);
}

/**
 * Type guard for bridge control messages
 */
export function isControlMessage(message: unknown): message is ControlMessage {
  if (!isObject(message)) {
    return false;
  }
  if (message.type === 'shutdown') {
    return true;
  }
  return (
    message.type === 'attach' &&
    typeof message.id === 'number' &&
    message.calls instanceof MessagePort &&
    message.events instanceof MessagePort
  );
}

/**
 * Type guard for one step of a remote line iterator
 */
export function isIteratorStep(value: unknown): value is IteratorStep {
  return (
    isObject(value) &&
    typeof value.done === 'boolean' &&
    (value.value === undefined || value.value instanceof Uint8Array)
  );
}

/**
 * Type guard for a list of byte arrays
 */
export function isByteArrayList(value: unknown): value is Uint8Array[] {
  return Array.isArray(value) && value.every((item) => item instanceof Uint8Array);
}

/**
 * Type guard for the scheduler thread's startup data
 */
export function isSchedulerData(value: unknown): value is SchedulerData {
  return isObject(value) && value.state instanceof Int32Array && typeof value.debug === 'boolean';
}
