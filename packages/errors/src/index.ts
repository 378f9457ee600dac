export { AppError, toAppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  StageUnreachableError,
  StageRejectedError,
  StageTimeoutError,
  RecoveryUnparseableError,
  RecoverySchemaMismatchError,
  ReconcileIncompleteError,
  DeadlineExceededError,
  ConfigError,
} from "./errors.js";
export type { MissingEnrichment } from "./errors.js";

export { withRetry, isRetryable, calculateDelay, abortReason, sleep } from "./retry.js";
export type { RetryOptions, RetryAttemptInfo, RetryState } from "./retry.js";
