/**
 * Delay and exponential backoff utilities for retrying external calls
 */

const BACKOFF_MULTIPLIER = 2; // 2x exponential backoff
const INITIAL_DELAY_MS = 1000; // 1 second
const MAX_DELAY_MS = 60 * 1000; // 1 minute

export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialDelayMs: INITIAL_DELAY_MS,
  maxDelayMs: MAX_DELAY_MS,
};

/**
 * Delay before the next attempt after `failures` consecutive failures (1-based)
 */
export function backoffDelay(failures: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  if (failures <= 0) return 0;
  return Math.min(policy.initialDelayMs * Math.pow(BACKOFF_MULTIPLIER, failures - 1), policy.maxDelayMs);
}

/**
 * Human-readable delay, e.g. "500ms", "4s", "2m"
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60 * 1000) return `${Math.round(ms / 1000)}s`;
  return `${Math.round(ms / (60 * 1000))}m`;
}

/**
 * Promise-based delay that rejects with the signal's reason when aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
