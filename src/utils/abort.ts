/**
 * Cancellation support for store calls.
 *
 * ioredis has no way to retract a command once written to the socket, so an
 * abort settles the caller's promise and the late reply is dropped.
 */

export class OperationAbortedError extends Error {
  constructor(reason?: unknown) {
    super('operation aborted', { cause: reason });
    this.name = 'AbortError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationAbortedError(signal.reason);
  }
}

/**
 * Run `operation` unless `signal` fires first.
 */
export async function withAbort<T>(
  operation: () => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) return operation();
  throwIfAborted(signal);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new OperationAbortedError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });

    operation().then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
