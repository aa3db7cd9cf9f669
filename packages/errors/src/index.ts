export { AppError, describeError } from "./app-error.js";
export type { AppErrorOptions, SerializedAppError } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  InvalidTransitionError,
  ValidationError,
  InsufficientCreditsError,
  UnsupportedMimeTypeError,
  RateLimitedError,
  TimeoutError,
  ExternalServiceError,
  ProviderRejectedError,
  PhaseError,
} from "./errors.js";

export { fromUpstreamStatus, upstreamStatusOf, parseRetryAfter } from "./upstream.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, BreakerLogger } from "./circuit-breaker.js";

export { withRetry, isRetryable } from "./retry.js";
export type { RetryOptions, RetryAttemptInfo } from "./retry.js";
