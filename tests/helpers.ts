import type { EventEmitter } from 'node:events';
import { vi } from 'vitest';
import type { Logger } from '../src/logger.js';

/**
 * Wait for an event to be emitted
 *
 * @param emitter - Event emitter to listen on
 * @param event - Event name to wait for
 * @param timeout - Timeout in milliseconds (default: 1000)
 * @returns Promise that resolves with event arguments
 *
 * @example
 * ```typescript
 * const closed = waitForEvent(sock, 'eof');
 * await sock.write('bye\n');
 * await closed;
 * ```
 */
export function waitForEvent(
  emitter: EventEmitter,
  event: string,
  timeout = 1000
): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    const timeoutHandle = setTimeout(() => {
      reject(new Error(`Event '${event}' not emitted within ${timeout}ms`));
    }, timeout);

    emitter.once(event, (...args: unknown[]) => {
      clearTimeout(timeoutHandle);
      resolve(args);
    });
  });
}

/**
 * Wait for a condition to become true
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Timeout in milliseconds (default: 1000)
 * @param interval - Check interval in milliseconds (default: 10)
 * @returns Promise that resolves when condition is met
 */
export function waitForCondition(
  condition: () => boolean,
  timeout = 1000,
  interval = 10
): Promise<void> {
  return new Promise((resolve, reject) => {
    const startTime = Date.now();

    const check = () => {
      if (condition()) {
        resolve();
        return;
      }

      if (Date.now() - startTime >= timeout) {
        reject(new Error(`Condition not met within ${timeout}ms`));
        return;
      }

      setTimeout(check, interval);
    };

    check();
  });
}

/**
 * Delay for a specified time
 *
 * @param ms - Milliseconds to delay
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Logger whose methods are all spies
 */
export function createMockLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/**
 * Capture a rejection as a value so it can be asserted after other steps
 */
export function settle<T>(promise: Promise<T>): Promise<unknown> {
  return promise.then(
    () => new Error('expected a rejection'),
    (error: unknown) => error
  );
}
