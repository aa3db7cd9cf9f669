import type { AppError } from "./app-error.js";
import {
  ExternalServiceError,
  ProviderRejectedError,
  RateLimitedError,
  TimeoutError,
} from "./errors.js";

/**
 * Map an upstream HTTP status to the error class the retry policy understands.
 * 429 and 5xx are transient, any other 4xx is terminal.
 */
export function fromUpstreamStatus(
  service: string,
  status: number,
  message: string,
  retryAfterSeconds: number | null = null,
): AppError {
  if (status === 429) {
    return new RateLimitedError(`${service}: ${message}`, retryAfterSeconds, {
      details: { service, status },
    });
  }
  if (status === 408 || status === 504) {
    return new TimeoutError(`${service}: ${message}`, { details: { service, status } });
  }
  if (status >= 500) {
    return new ExternalServiceError(`${service}: ${message}`, service, {
      details: { status },
    });
  }
  return new ProviderRejectedError(`${service}: ${message}`, service, status);
}

/**
 * Extract the HTTP status carried by SDK errors (`status` on OpenAI, `statusCode` on Cohere).
 */
export function upstreamStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) {
    return undefined;
  }
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

/** Parse a Retry-After header given in seconds. */
export function parseRetryAfter(header: string | null): number | null {
  if (header === null) return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}
