import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed; false disables it. Default: 10000 */
  timeout?: number | false;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Return true for errors that should not count as failures. */
  errorFilter?: (err: unknown) => boolean;
  /** Receives state changes; defaults to console warnings. */
  logger?: BreakerLogger;
}

export interface BreakerLogger {
  warn(obj: Record<string, unknown>, msg: string): void;
}

const DEFAULT_OPTIONS = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

const consoleLogger: BreakerLogger = {
  warn(obj, msg) {
    console.warn(`[circuit-breaker] ${msg}`, obj);
  },
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const { logger = consoleLogger, ...breakerOptions } = options ?? {};
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...breakerOptions, name });

  breaker.on("open", () => {
    logger.warn({ breaker: name }, "circuit OPENED (requests will be short-circuited)");
  });

  breaker.on("halfOpen", () => {
    logger.warn({ breaker: name }, "circuit HALF-OPEN (next request is a test)");
  });

  breaker.on("close", () => {
    logger.warn({ breaker: name }, "circuit CLOSED (back to normal)");
  });

  return breaker;
}
