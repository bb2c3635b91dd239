import { parentPort, workerData } from 'node:worker_threads';
import { resolveLogger } from '../logger.js';
import { isSchedulerData } from '../utils/typeGuards.js';
import { BRIDGE_RUNNING } from './protocol.js';
import { Scheduler } from './scheduler.js';

// Bridge thread entry point

if (!parentPort || !isSchedulerData(workerData)) {
  throw new Error('bridge worker must be started by SyncBridge');
}

const { state, debug } = workerData;
const scheduler = new Scheduler(state, resolveLogger({ debug }, '[sockline] bridge'));

process.on('exit', () => scheduler.markDead());
parentPort.on('message', (message: unknown) => scheduler.handle(message));

Atomics.store(state, 0, BRIDGE_RUNNING);
Atomics.notify(state, 0);
