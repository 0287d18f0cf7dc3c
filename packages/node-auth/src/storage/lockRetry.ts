export type LockRetryOptions = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_MAX_DELAY_MS = 1000;

const LOCK_ERROR_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED"];

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** SQLite reports contention as SQLITE_BUSY / SQLITE_LOCKED (and their extended variants). */
export function isLockError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  const code = error.code;
  return typeof code === "string" && LOCK_ERROR_CODES.some((prefix) => code.startsWith(prefix));
}

/**
 * Runs `fn`, retrying lock errors with exponential backoff. `attempts` counts
 * retries after the first call; any other error is rethrown at once.
 */
export async function withLockRetry<T>(fn: () => T | Promise<T>, options: LockRetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (!isLockError(error) || attempt >= options.attempts) throw error;

      const delayMs = Math.min(options.baseDelayMs * 2 ** attempt, maxDelayMs);
      options.onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs);
    }
  }
}
