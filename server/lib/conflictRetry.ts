import pRetry, { AbortError } from "p-retry";
import { createError, isUniqueViolation } from "../errors";

export interface ConflictRetryOptions {
  retries?: number;
  minTimeout?: number;
  label?: string;
}

/**
 * Re-runs a write that lost a race on one of the "current row" unique indexes.
 * Any other failure aborts immediately.
 */
export async function withConflictRetry<T>(
  operation: () => Promise<T>,
  options: ConflictRetryOptions = {}
): Promise<T> {
  const { retries = 4, minTimeout = 25, label = "write" } = options;

  try {
    return await pRetry(
      async () => {
        try {
          return await operation();
        } catch (error) {
          if (isUniqueViolation(error)) {
            throw error;
          }
          throw new AbortError(error instanceof Error ? error : String(error));
        }
      },
      {
        retries,
        minTimeout,
        maxTimeout: 1000,
        factor: 2,
        onFailedAttempt: (error) => {
          console.warn(`[ConflictRetry] ${label} conflicted (attempt ${error.attemptNumber}, ${error.retriesLeft} retries left)`);
        },
      }
    );
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw createError("CONCURRENCY_CONFLICT", { label });
    }
    throw error;
  }
}
