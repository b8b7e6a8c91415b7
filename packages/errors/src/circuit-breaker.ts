import CircuitBreaker from "opossum";
import { createSilentLogger, type Logger } from "@logrecall/logger";
import { UpstreamTimeoutError, UpstreamUnavailableError } from "./errors.js";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 30000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of calls in the window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Receives circuit state changes. */
  logger?: Logger;
}

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout" | "volumeThreshold">
> = {
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TI, TR> {
  const { logger = createSilentLogger(), ...breakerOptions }: CircuitBreakerOptions = options ?? {};
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...breakerOptions, name });

  breaker.on("open", () => {
    logger.warn({ breaker: name }, "Circuit opened; calls are short-circuited");
  });
  breaker.on("halfOpen", () => {
    logger.info({ breaker: name }, "Circuit half-open; next call is a trial");
  });
  breaker.on("close", () => {
    logger.info({ breaker: name }, "Circuit closed");
  });

  return breaker;
}

function breakerCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Fire a breaker and translate its own failures into the upstream error types:
 * a timeout becomes {@link UpstreamTimeoutError}, a short-circuited call
 * {@link UpstreamUnavailableError}. Errors raised by the wrapped call pass through.
 */
export async function fireGuarded<TI extends unknown[], TR>(
  breaker: CircuitBreaker<TI, TR>,
  service: string,
  timeoutMs: number,
  ...args: TI
): Promise<TR> {
  try {
    return await breaker.fire(...args);
  } catch (error: unknown) {
    const code = breakerCode(error);
    if (code === "ETIMEDOUT") {
      throw new UpstreamTimeoutError(service, timeoutMs, { cause: error });
    }
    if (code === "EOPENBREAKER") {
      throw new UpstreamUnavailableError(service, `${service} circuit is open`, { cause: error });
    }
    throw error;
  }
}
