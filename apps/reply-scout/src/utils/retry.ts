export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Server-provided wait (e.g. `retry_after`), overrides the backoff when set. */
  delayHint?: (error: unknown) => number | undefined;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function callWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { attempts, delayMs, shouldRetry, delayHint, onRetry } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts) break;
      if (shouldRetry && !shouldRetry(error, attempt)) break;

      // Exponential backoff
      const backoffDelay =
        delayHint?.(error) ?? delayMs * Math.pow(2, attempt - 1);
      onRetry?.(error, attempt, backoffDelay);
      await sleep(backoffDelay);
    }
  }

  throw lastError;
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label = "operation"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
