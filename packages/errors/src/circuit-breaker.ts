import CircuitBreaker from "opossum";
import type { Logger } from "@indexloom/logger";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Errors for which this returns true do not count as failures. */
  errorFilter?: (error: unknown) => boolean;
  logger?: Logger;
}

const DEFAULT_OPTIONS = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const breaker = new CircuitBreaker(fn, {
    name,
    timeout: options?.timeout ?? DEFAULT_OPTIONS.timeout,
    errorThresholdPercentage:
      options?.errorThresholdPercentage ?? DEFAULT_OPTIONS.errorThresholdPercentage,
    resetTimeout: options?.resetTimeout ?? DEFAULT_OPTIONS.resetTimeout,
    volumeThreshold: options?.volumeThreshold ?? DEFAULT_OPTIONS.volumeThreshold,
    errorFilter: options?.errorFilter,
  });
  const logger = options?.logger;

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "circuit opened, calls will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name }, "circuit half-open, next call is a trial");
  });

  breaker.on("close", () => {
    logger?.info({ breaker: name }, "circuit closed");
  });

  return breaker;
}
