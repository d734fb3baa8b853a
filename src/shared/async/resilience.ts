import { AppError } from '../errors/app-error';

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

export interface WithTimeoutOptions {
  /** Builds the rejection for an expired deadline. Defaults to an AppError with code TIMEOUT. */
  onTimeout?: (timeoutMs: number) => Error;
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  opts: WithTimeoutOptions = {},
): Promise<T> {
  assertPositiveInteger(timeoutMs, 'timeoutMs');

  let timeoutId: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(
            opts.onTimeout?.(timeoutMs) ??
              new AppError('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`),
          );
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
