import type { MessagePort } from 'node:worker_threads';
import { TCP } from '../controller.js';
import { serializeError } from '../error.js';
import type { Logger } from '../logger.js';
import { isCallMessage, isControlMessage } from '../utils/typeGuards.js';
import { OperationQueue } from '../utils/serialize.js';
import {
  BRIDGE_STOPPED,
  type BridgedTCPConfig,
  type CallMessage,
  type ControlMessage,
  type EventMessage,
  type ResultMessage,
  SLOT_DEAD,
  SLOT_DONE,
  type WireValue,
} from './protocol.js';

/**
 * A controller living on the scheduler thread and the proxies bound to it
 */
interface Hosted {
  controller: TCP;
  queue: OperationQueue;
  iterators: Map<number, AsyncGenerator<Buffer, void, undefined>>;
  nextIterator: number;
  events: Set<MessagePort>;
  calls: Set<MessagePort>;
}

/**
 * Fresh copy with its own backing store; pooled Buffers would otherwise carry
 * the whole pool across the thread boundary.
 */
function toWire(bytes: Buffer): Uint8Array {
  return new Uint8Array(bytes);
}

/**
 * Runs inside the bridge thread: hosts controllers and executes the calls
 * proxies send them.
 *
 * Calls for one controller run one at a time in arrival order, whatever
 * proxy they came from. Different controllers progress concurrently on the
 * thread's event loop.
 */
export class Scheduler {
  private readonly hosted = new Map<number, Hosted>();
  private readonly pendingWakes = new Set<Int32Array>();
  private stopping = false;

  constructor(
    private readonly state: Int32Array,
    private readonly logger: Logger
  ) {}

  /**
   * Entry point for messages from the bridge
   */
  handle(message: unknown): void {
    if (!isControlMessage(message)) {
      this.logger.warn('Ignoring unknown control message');
      return;
    }
    this.control(message);
  }

  /**
   * Close every hosted controller
   */
  async shutdown(): Promise<void> {
    this.stopping = true;
    const hosted = [...this.hosted.values()];
    this.hosted.clear();

    await Promise.all(
      hosted.map(async (entry) => {
        try {
          await entry.controller.close();
        } catch (error) {
          this.logger.error(`Error closing ${entry.controller.toString()}:`, error);
        }
        for (const port of [...entry.calls, ...entry.events]) {
          port.close();
        }
      })
    );
  }

  /**
   * Thread is going away: release every blocked caller
   */
  markDead(): void {
    Atomics.store(this.state, 0, BRIDGE_STOPPED);
    Atomics.notify(this.state, 0);
    for (const wake of this.pendingWakes) {
      Atomics.store(wake, 0, SLOT_DEAD);
      Atomics.notify(wake, 0);
    }
    this.pendingWakes.clear();
  }

  private control(message: ControlMessage): void {
    switch (message.type) {
      case 'attach':
        this.attach(message.id, message.config, message.calls, message.events);
        break;
      case 'shutdown':
        this.shutdown().then(
          () => process.exit(0),
          (error: unknown) => {
            this.logger.error('Shutdown failed:', error);
            process.exit(1);
          }
        );
        break;
    }
  }

  private attach(
    id: number,
    config: BridgedTCPConfig | undefined,
    calls: MessagePort,
    events: MessagePort
  ): void {
    let entry = this.hosted.get(id);

    if (!entry) {
      if (!config || this.stopping) {
        this.refuse(calls, new Error(`No controller #${id} on the bridge thread`));
        events.close();
        return;
      }
      try {
        entry = this.host(id, config);
      } catch (error) {
        this.refuse(calls, error);
        events.close();
        return;
      }
    }

    const hosted = entry;
    hosted.calls.add(calls);
    hosted.events.add(events);

    calls.on('message', (message: unknown) => this.dispatch(hosted, calls, message));
    calls.on('close', () => this.detach(id, hosted, calls, events));
    events.on('close', () => hosted.events.delete(events));
  }

  private host(id: number, config: BridgedTCPConfig): Hosted {
    const controller = new TCP(config);
    const hosted: Hosted = {
      controller,
      queue: new OperationQueue(),
      iterators: new Map(),
      nextIterator: 0,
      events: new Set(),
      calls: new Set(),
    };

    controller.on('connected', () => this.broadcast(hosted, { type: 'event', name: 'connected' }));
    controller.on('eof', () => this.broadcast(hosted, { type: 'event', name: 'eof' }));
    controller.on('disconnected', (cause: Error) =>
      this.broadcast(hosted, { type: 'event', name: 'disconnected', cause: serializeError(cause) })
    );

    this.hosted.set(id, hosted);
    this.logger.debug(`hosting ${controller.toString()} as #${id}`);
    return hosted;
  }

  /**
   * Last proxy gone: the controller has no caller left
   */
  private detach(id: number, hosted: Hosted, calls: MessagePort, events: MessagePort): void {
    hosted.calls.delete(calls);
    hosted.events.delete(events);
    events.close();
    if (hosted.calls.size > 0 || this.hosted.get(id) !== hosted) {
      return;
    }

    this.hosted.delete(id);
    this.logger.debug(`releasing #${id}`);
    hosted.queue
      .run(() => hosted.controller.close())
      .catch((error: unknown) => this.logger.error(`Error closing #${id}:`, error));
  }

  private dispatch(hosted: Hosted, port: MessagePort, message: unknown): void {
    if (!isCallMessage(message)) {
      this.logger.warn('Ignoring malformed call');
      return;
    }

    const { callId, wake } = message;
    if (wake) {
      this.pendingWakes.add(wake);
    }

    hosted.queue
      .run(() => this.invoke(hosted, message))
      .then(
        (value): ResultMessage => ({ type: 'result', callId, ok: true, value }),
        (error: unknown): ResultMessage => ({
          type: 'result',
          callId,
          ok: false,
          error: serializeError(error),
        })
      )
      .then((result) => this.reply(port, result, wake))
      .catch((error: unknown) =>
        this.logger.error(`Failed to deliver result of call ${callId}:`, error)
      );
  }

  private reply(port: MessagePort, result: ResultMessage, wake: Int32Array | undefined): void {
    port.postMessage(result);
    if (wake) {
      this.pendingWakes.delete(wake);
      Atomics.store(wake, 0, SLOT_DONE);
      Atomics.notify(wake, 0);
    }
  }

  private refuse(port: MessagePort, reason: unknown): void {
    const error = serializeError(reason);
    this.logger.error(`Refusing proxy: ${error.message}`);
    port.on('message', (message: unknown) => {
      if (isCallMessage(message)) {
        this.reply(port, { type: 'result', callId: message.callId, ok: false, error }, message.wake);
      }
    });
  }

  private broadcast(hosted: Hosted, event: EventMessage): void {
    for (const port of hosted.events) {
      port.postMessage(event);
    }
  }

  private async invoke(hosted: Hosted, call: CallMessage): Promise<WireValue> {
    const { controller } = hosted;

    switch (call.method) {
      case 'open':
        await controller.open(...call.args);
        return undefined;
      case 'close':
        await controller.close();
        return undefined;
      case 'connected':
        return controller.connected();
      case 'connectionCounter':
        return controller.connectionCounter;
      case 'inWaiting':
        return controller.inWaiting();
      case 'readAvailable':
        return toWire(controller.readAvailable());
      case 'reset':
        controller.reset();
        return undefined;
      case 'read':
        return toWire(await controller.read(...call.args));
      case 'readLine':
        return toWire(await controller.readLine(...call.args));
      case 'readLines':
        return (await controller.readLines(...call.args)).map(toWire);
      case 'readExactly':
        return toWire(await controller.readExactly(...call.args));
      case 'readUntil':
        return toWire(await controller.readUntil(...call.args));
      case 'write':
        await controller.write(...call.args);
        return undefined;
      case 'writeLines':
        await controller.writeLines(...call.args);
        return undefined;
      case 'writeThenReadLine':
        return toWire(await controller.writeThenReadLine(...call.args));
      case 'writeThenReadLines':
        return (await controller.writeThenReadLines(...call.args)).map(toWire);
      case 'writeLinesThenReadLines':
        return (await controller.writeLinesThenReadLines(...call.args)).map(toWire);
      case 'iterate': {
        const id = ++hosted.nextIterator;
        hosted.iterators.set(id, controller.lines(...call.args));
        return id;
      }
      case 'next': {
        const [id] = call.args;
        const iterator = hosted.iterators.get(id);
        if (!iterator) {
          return { done: true };
        }
        try {
          const step = await iterator.next();
          if (step.done) {
            hosted.iterators.delete(id);
            return { done: true };
          }
          return { done: false, value: toWire(step.value) };
        } catch (error) {
          hosted.iterators.delete(id);
          throw error;
        }
      }
      case 'return': {
        const [id] = call.args;
        const iterator = hosted.iterators.get(id);
        hosted.iterators.delete(id);
        await iterator?.return();
        return undefined;
      }
    }
  }
}
