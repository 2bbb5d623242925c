export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicy {
  attempts: number;
  /** Delay after the failed 1-based `attempt`, when another attempt follows. */
  backoffMs: (attempt: number) => number;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Operation failed after ${attempts} attempts`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export const defaultSleep: Sleep = async (ms) => {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
};

export function cappedExponentialBackoff(maxMs: number, baseMs = 1000): (attempt: number) => number {
  return (attempt) => Math.min(2 ** attempt * baseMs, maxMs);
}

export async function withRetry<T>(operation: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.attempts);
  let lastErr: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation();
    } catch (err) {
      lastErr = err;
      if (attempt === attempts) break;
      const delayMs = policy.backoffMs(attempt);
      policy.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
  throw new RetryExhaustedError(attempts, lastErr);
}
