export interface BackoffPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff: base, 2*base, 4*base ... capped at backoffCapMs.
 * `attempt` is the 1-based number of the attempt that just failed.
 */
export function backoffDelay(policy: Pick<BackoffPolicy, 'backoffBaseMs' | 'backoffCapMs'>, attempt: number): number {
  const exponential = policy.backoffBaseMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(policy.backoffCapMs, exponential);
}

export interface RetryOptions extends BackoffPolicy {
  /** Decides whether a failure is worth another attempt. */
  isRetryable: (error: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or maxAttempts is reached.
 * Always rejects with RetryExhaustedError so callers can wrap the last cause in their own error.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !options.isRetryable(error)) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = backoffDelay(options, attempt);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
