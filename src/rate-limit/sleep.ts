/**
 * @webhook-relay/core - Abortable sleep
 */

export class SleepAbortedError extends Error {
  constructor() {
    super('Wait aborted');
    this.name = 'SleepAbortedError';
  }
}

/**
 * Resolves after `ms`, or rejects with SleepAbortedError when `signal` aborts first.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SleepAbortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(new SleepAbortedError());
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
