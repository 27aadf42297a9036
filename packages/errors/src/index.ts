export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions, ErrorCode } from "./app-error.js";

export {
  ConfigurationError,
  UnsupportedSourceKindError,
  SourceNotFoundError,
  SourceUnreachableError,
  RateLimitedError,
  ServiceUnavailableError,
  InvalidRequestError,
  NotConfiguredError,
  EmbeddingServiceError,
  CollectionNotFoundError,
  DimensionMismatchError,
  UpsertFailedError,
  AliasNotFoundError,
  IndexStoreError,
} from "./errors.js";

export { fromHttpStatus } from "./http.js";

export {
  calculateDelay,
  classifyError,
  fail,
  isRetryableKind,
  ok,
  retryWithBackoff,
  withRetry,
} from "./retry.js";
export type {
  Result,
  RetryAttemptInfo,
  RetryErrorKind,
  RetryFailure,
  RetryOptions,
} from "./retry.js";
