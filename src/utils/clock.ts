/**
 * Clock Utility
 *
 * Time source used by the probe, the orchestrator and the engine. Injected so
 * that polling loops can be driven by a virtual clock in tests.
 */

export interface Clock {
  /** Epoch milliseconds; transition timestamps are taken from it */
  now(): number;

  /**
   * Wait for `ms` milliseconds. Resolves early (never rejects) when the
   * signal is aborted.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise(resolve => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export const systemClock: Clock = new SystemClock();
