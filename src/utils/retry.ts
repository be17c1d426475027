export interface BackoffOptions {
  readonly baseDelayMs: number;
  /** Upper bound of the random jitter added per attempt already made. */
  readonly jitterMs?: number;
  readonly maxDelayMs?: number;
  readonly random?: () => number;
}

export interface RetryOptions<T> extends BackoffOptions {
  readonly maxAttempts: number;
  /** Called with each result; returning true schedules another attempt. */
  readonly shouldRetry: (value: T) => boolean;
  readonly signal?: AbortSignal;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly onRetry?: (attempt: number, delayMs: number) => void;
  /** Overrides the backoff delay for a result, e.g. a server-requested wait. */
  readonly delayFor?: (value: T, attempt: number) => number | undefined;
}

export interface RetryResult<T> {
  readonly value: T;
  readonly attempts: number;
}

const DEFAULT_MAX_DELAY_MS = 10 * 60_000;

/** `base * 2^attempt` plus a jitter that grows linearly with the attempt number. */
export function backoffDelay(attempt: number, opts: BackoffOptions): number {
  const random = opts.random ?? Math.random;
  const exponential = opts.baseDelayMs * 2 ** attempt;
  const jitter = random() * (opts.jitterMs ?? 0) * (attempt + 1);
  return Math.min(exponential + jitter, opts.maxDelayMs ?? DEFAULT_MAX_DELAY_MS);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

/**
 * Run `fn` until `shouldRetry` rejects its result or `maxAttempts` calls were
 * made. The last result is returned either way; thrown errors propagate at once.
 */
export async function retryWhile<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions<T>,
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, opts.maxAttempts);
  const wait = opts.sleep ?? sleep;

  let attempt = 0;
  for (;;) {
    opts.signal?.throwIfAborted();

    const value = await fn(attempt);
    const attempts = attempt + 1;
    if (!opts.shouldRetry(value) || attempts >= maxAttempts) {
      return { value, attempts };
    }

    const delayMs = opts.delayFor?.(value, attempt) ?? backoffDelay(attempt, opts);
    opts.onRetry?.(attempts, delayMs);
    await wait(delayMs, opts.signal);
    attempt = attempts;
  }
}
