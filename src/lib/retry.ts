import { describeError, isAbortError, isRagError, StoreUnavailableError } from "./errors";

export type RetryPolicy = {
  /** Total attempts including the first one. */
  attempts: number;
  /** Delay before the second attempt; doubles after every failure. */
  baseDelayMs: number;
  /** Upper bound for a single attempt. */
  timeoutMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 250,
  timeoutMs: 10_000,
};

export type RetryOptions = Partial<RetryPolicy> & {
  label: string;
  signal?: AbortSignal;
  /** Error raised when an attempt exceeds `timeoutMs`. */
  onTimeout?: (label: string, timeoutMs: number) => Error;
};

function defaultTimeoutError(label: string, timeoutMs: number): Error {
  return new StoreUnavailableError(`${label} timed out after ${timeoutMs}ms.`);
}

function isRetryable(err: unknown): boolean {
  return isRagError(err) && err.retryable;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (ms <= 0) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

async function attemptWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: { label: string; timeoutMs: number; signal?: AbortSignal; onTimeout: RetryOptions["onTimeout"] },
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = (opts.onTimeout ?? defaultTimeoutError)(opts.label, opts.timeoutMs);
      controller.abort(err);
      reject(err);
    }, opts.timeoutMs);

    const outer = opts.signal;
    if (outer) {
      onAbort = () => {
        controller.abort(outer.reason);
        reject(outer.reason);
      };
      outer.addEventListener("abort", onAbort, { once: true });
    }
  });

  const work = fn(controller.signal);
  // The losing side of the race settles later; keep its rejection observed.
  work.catch((err: unknown) => {
    if (controller.signal.aborted && !isAbortError(err)) {
      console.warn(`[retry] ${opts.label} abandoned attempt failed: ${describeError(err)}`);
    }
  });

  try {
    return await Promise.race([work, interrupted]);
  } finally {
    clearTimeout(timer);
    if (onAbort) opts.signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Run `fn` with a per-attempt timeout and bounded exponential backoff
 * (`baseDelayMs * 2^attempt`). Only errors flagged `retryable` are retried;
 * cancellation through `signal` is re-thrown as is.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts ?? DEFAULT_RETRY_POLICY.attempts));
  const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs);
  const timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_RETRY_POLICY.timeoutMs);

  for (let attempt = 0; attempt < attempts; attempt += 1) {
    options.signal?.throwIfAborted();
    try {
      return await attemptWithTimeout(fn, {
        label: options.label,
        timeoutMs,
        signal: options.signal,
        onTimeout: options.onTimeout,
      });
    } catch (err) {
      if (options.signal?.aborted) throw options.signal.reason;
      if (!isRetryable(err) || attempt === attempts - 1) throw err;

      const delay = baseDelayMs * 2 ** attempt;
      console.warn(
        `[retry] ${options.label} attempt ${attempt + 1}/${attempts} failed: ${describeError(err)}. ` +
          `Retrying in ${delay}ms...`,
      );
      await sleep(delay, options.signal);
    }
  }
  throw new Error(`${options.label}: exhausted retries`);
}
