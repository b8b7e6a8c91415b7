export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ParseError,
  CollectionSetupError,
  WriteError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  ValidationError,
  TrackerStateError,
  NotFoundError,
  ExternalServiceError,
} from "./errors.js";
export type { ErrorExtras } from "./errors.js";

export { createCircuitBreaker, fireGuarded } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
