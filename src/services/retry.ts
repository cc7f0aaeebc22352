import type { SynthesisResult } from '../models/SynthesisResult';
import { ThrottledError } from '../errors';

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry, doubled for each one after */
  baseDelayMs: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, result: SynthesisResult) => void;
}

export interface RetryOutcome {
  result: SynthesisResult;
  attempts: number;
}

/**
 * Sleep that ends early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Repeat a synthesis while it fails with a retryable error
 */
export async function retrySynthesis(
  fn: () => Promise<SynthesisResult>,
  options: RetryOptions
): Promise<RetryOutcome> {
  const { maxRetries, baseDelayMs, maxDelayMs, signal, onRetry } = options;
  let attempts = 0;

  for (;;) {
    attempts++;
    const result = await fn();
    if (result.ok || !result.error.retryable || attempts > maxRetries || signal?.aborted) {
      return { result, attempts };
    }

    let delayMs = backoffDelay(attempts, baseDelayMs, maxDelayMs);
    if (result.error instanceof ThrottledError && result.error.retryAfterMs !== undefined) {
      delayMs = Math.max(delayMs, result.error.retryAfterMs);
    }
    onRetry?.(attempts, delayMs, result);
    await sleep(delayMs, signal);
  }
}
