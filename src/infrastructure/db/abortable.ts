import { EventServiceError, StorageError } from '../../domain/index.js';

function toStorageError(err: unknown): Error {
  if (err instanceof EventServiceError) {
    return err;
  }
  return new StorageError('Storage operation failed', { cause: err });
}

/**
 * Runs a storage call and settles as soon as `signal` aborts.
 *
 * Driver failures are wrapped in StorageError with the original as
 * `cause`. Drizzle query builders are lazy thenables, so `run` is only
 * invoked once the signal is known to be live.
 */
export function abortable<T>(
  signal: AbortSignal | undefined,
  run: () => PromiseLike<T>,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new StorageError('Storage operation aborted', { cause: signal?.reason }));
    };

    if (signal?.aborted === true) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    let pending: PromiseLike<T>;
    try {
      pending = run();
    } catch (err: unknown) {
      signal?.removeEventListener('abort', onAbort);
      reject(toStorageError(err));
      return;
    }

    void Promise.resolve(pending).then(
      (value) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal?.removeEventListener('abort', onAbort);
        reject(toStorageError(err));
      },
    );
  });
}
