export type SettleOutcome =
  | { kind: 'resolved' }
  | { kind: 'rejected'; error: unknown }
  | { kind: 'timed_out' };

export const withTimeout = <T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timeoutHandle = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timeoutHandle);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeoutHandle);
        reject(error);
      }
    );
  });

// Never rejects; a promise that outlives the deadline is left running.
export const settleWithin = (promise: Promise<unknown>, timeoutMs: number): Promise<SettleOutcome> =>
  new Promise<SettleOutcome>((resolve) => {
    const timeoutHandle = setTimeout(() => {
      resolve({ kind: 'timed_out' });
    }, timeoutMs);

    promise.then(
      () => {
        clearTimeout(timeoutHandle);
        resolve({ kind: 'resolved' });
      },
      (error: unknown) => {
        clearTimeout(timeoutHandle);
        resolve({ kind: 'rejected', error });
      }
    );
  });
