export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  ValidationError,
  TransientProviderError,
  PermanentProviderError,
  SourceFetchError,
  ConsistencyError,
  BatchEmbeddingError,
  InvalidJobTransitionError,
} from "./errors.js";
export type { TransientErrorKind, PermanentErrorKind } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export {
  withRetry,
  decideRetry,
  classifyError,
  isTransientKind,
  retryAfterOf,
  DEFAULT_RETRY_POLICY,
} from "./retry.js";
export type {
  RetryOptions,
  RetryPolicy,
  RetryDecision,
  RetryAttemptInfo,
  ErrorKind,
} from "./retry.js";
