import { INGEST_DEFAULTS } from '../../src/config/ingest/constants';
import { RetryExhaustedError, type Sleep, withRetry } from '../../src/utils/retry';

export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  attempts = INGEST_DEFAULTS.retryAttempts,
  baseDelayMs = INGEST_DEFAULTS.retryBaseDelayMs,
  sleep?: Sleep
): Promise<Response> {
  try {
    return await withRetry(
      async () => {
        const res = await fetch(url, options);
        if (!res.ok) throw new Error(`HTTP ${res.status}`);
        return res;
      },
      { attempts, backoffMs: (attempt) => baseDelayMs * 2 ** (attempt - 1), sleep }
    );
  } catch (err) {
    if (err instanceof RetryExhaustedError && err.cause instanceof Error) throw err.cause;
    throw err instanceof Error ? err : new Error('fetchWithRetry failed');
  }
}
