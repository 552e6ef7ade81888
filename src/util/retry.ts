import pRetry, { AbortError } from "p-retry";

export interface RetryOptions {
  /** Total attempts, including the first one. */
  attempts: number;
  isRetryable: (error: Error) => boolean;
  /** Delay before the first retry in ms; doubles after each. */
  minTimeout?: number;
  onRetry?: (error: Error, attempt: number, attemptsLeft: number) => void;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export async function retryWith<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  return pRetry(
    async (attempt) => {
      try {
        return await fn(attempt);
      } catch (err) {
        const error = asError(err);
        if (!options.isRetryable(error)) {
          throw new AbortError(error);
        }
        throw error;
      }
    },
    {
      retries: Math.max(0, options.attempts - 1),
      minTimeout: options.minTimeout ?? 1000,
      factor: 2,
      onFailedAttempt: (error) => {
        if (error.retriesLeft > 0) {
          options.onRetry?.(error, error.attemptNumber, error.retriesLeft);
        }
      },
    },
  );
}
