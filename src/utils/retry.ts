export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound on the sum of all waits between attempts. */
  maxTotalDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
}

export const DEFAULT_RETRY = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
  maxTotalDelayMs: 30_000,
} as const;

export function abortReason(signal: AbortSignal): unknown {
  if (signal.reason !== undefined) return signal.reason;
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw abortReason(signal);
  if (ms <= 0) return;

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number
): number {
  return Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY.maxAttempts,
    initialDelayMs = DEFAULT_RETRY.initialDelayMs,
    maxDelayMs = DEFAULT_RETRY.maxDelayMs,
    maxTotalDelayMs = DEFAULT_RETRY.maxTotalDelayMs,
    shouldRetry = () => true,
    onRetry,
    signal,
  } = options;

  let lastError: unknown;
  let waited = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw abortReason(signal);

    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;

      if (attempt === maxAttempts || signal?.aborted || !shouldRetry(err)) {
        throw err;
      }

      const delay = Math.min(
        backoffDelay(attempt, initialDelayMs, maxDelayMs),
        maxTotalDelayMs - waited
      );

      onRetry?.({ attempt, delayMs: delay, error: err });
      await sleep(delay, signal);
      waited += delay;
    }
  }

  throw lastError;
}

const RETRYABLE_PATTERNS = [
  "rate limit",
  "timeout",
  "timed out",
  "econnreset",
  "econnrefused",
  "enotfound",
  "eai_again",
  "socket hang up",
  "fetch failed",
  "503",
  "502",
  "429",
];

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const message = error.message.toLowerCase();
  const cause = error.cause instanceof Error ? error.cause.message.toLowerCase() : "";

  return RETRYABLE_PATTERNS.some(
    (pattern) => message.includes(pattern) || cause.includes(pattern)
  );
}
