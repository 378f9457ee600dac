import { AppError } from "./app-error.js";

export interface RetryAttemptInfo {
  /** 1-based number of the retry about to happen. */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Aborting stops further attempts and interrupts the backoff sleep. */
  signal?: AbortSignal;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/** Position of the retry loop: how many attempts failed and how long the next wait is. */
export interface RetryState {
  attempt: number;
  nextDelayMs: number;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

const NEVER_RETRIED = new Set(["DEADLINE_EXCEEDED", "ABORTED"]);

/**
 * Determines whether an error is retryable.
 * Client errors (4xx) are NOT retried; server errors (5xx) and network errors ARE retried.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (NEVER_RETRIED.has(error.code)) {
      return false;
    }

    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    return error.statusCode >= 500;
  }

  // Non-AppError errors (e.g. network failures, unexpected errors) are retryable
  // unless a retryableErrors filter is specified
  if (retryableErrors && retryableErrors.length > 0) {
    const code =
      typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
    return typeof code === "string" && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/** The error an aborted signal stands for: its reason when that is an Error. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new AppError({ message: "Operation aborted", statusCode: 499, code: "ABORTED" });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * Does NOT retry on 4xx (client) errors -- only 5xx and network errors.
 *
 * The loop is driven by an explicit {@link RetryState}; `fn` receives the
 * zero-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const retryableErrors = options?.retryableErrors;
  const signal = options?.signal;

  let state: RetryState = { attempt: 0, nextDelayMs: 0 };

  for (;;) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    try {
      return await fn(state.attempt);
    } catch (error: unknown) {
      const exhausted = state.attempt >= maxRetries;
      if (exhausted || signal?.aborted || !isRetryable(error, retryableErrors)) {
        throw error;
      }

      state = {
        attempt: state.attempt + 1,
        nextDelayMs: calculateDelay(state.attempt, baseDelayMs, maxDelayMs),
      };
      options?.onRetry?.({
        attempt: state.attempt,
        maxRetries,
        delayMs: state.nextDelayMs,
        error,
      });
      await sleep(state.nextDelayMs, signal);
    }
  }
}
