import { sleep as defaultSleep, type SleepFn } from "../types/http";
import { LLMTransientError } from "./provider";

export interface RetryOptions {
  /** Extra attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
  sleep?: SleepFn;
  onRetry?: (err: LLMTransientError, attempt: number, waitMs: number) => void;
}

/**
 * Runs `fn`, retrying only on {@link LLMTransientError} with exponential
 * backoff (baseDelayMs, 2×, 4×, ...). Other errors propagate at once.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof LLMTransientError) || attempt >= options.maxRetries) {
        throw err;
      }
      const wait = options.baseDelayMs * 2 ** attempt;
      options.onRetry?.(err, attempt + 1, wait);
      await sleep(wait);
    }
  }
}
