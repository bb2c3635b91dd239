/**
 * An *upside-down* Promise, which can be settled from outside.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: Deferred<T>['resolve'] = () => {};
  let reject: Deferred<T>['reject'] = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Level-triggered wake signal
 *
 * `set()` wakes every current waiter and leaves the flag raised, so a waiter
 * arriving later returns immediately until someone calls `clear()`.
 * Waiters clear the flag after they observe it, never the data behind it.
 */
export class WakeSignal {
  private flag = false;
  private waiters = new Set<Deferred<void>>();

  set(): void {
    this.flag = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waiter of waiters) {
      waiter.resolve();
    }
  }

  clear(): void {
    this.flag = false;
  }

  /**
   * Resolve once the flag is raised. Rejects with `signal.reason` if the
   * abort signal fires first.
   */
  wait(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.flag) {
      return Promise.resolve();
    }

    const waiter = deferred<void>();
    this.waiters.add(waiter);

    if (!signal) {
      return waiter.promise;
    }

    const onAbort = () => {
      this.waiters.delete(waiter);
      waiter.reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    return waiter.promise.finally(() => signal.removeEventListener('abort', onAbort));
  }
}
