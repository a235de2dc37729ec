import { logger } from './logger.js';

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as
 * `signal` aborts. The abandoned promise keeps running; its eventual
 * rejection is logged rather than left unhandled.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, label: string): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    void promise.catch((err: unknown) => logger.debug({ err, label }, 'Abandoned operation failed'));
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      void promise.catch((err: unknown) => logger.debug({ err, label }, 'Abandoned operation failed'));
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export function isAbortError(err: unknown, signal: AbortSignal | undefined): boolean {
  return signal !== undefined && signal.aborted && err === signal.reason;
}
