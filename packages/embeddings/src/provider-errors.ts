import {
  AppError,
  ExternalServiceError,
  TimeoutError,
  fromUpstreamStatus,
  parseRetryAfter,
  upstreamStatusOf,
} from "@indexflow/errors";

function retryAfterOf(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("headers" in error)) {
    return null;
  }
  const headers = error.headers;
  if (headers instanceof Headers) {
    return parseRetryAfter(headers.get("retry-after"));
  }
  if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
    const value = headers["retry-after"];
    return typeof value === "string" ? parseRetryAfter(value) : null;
  }
  return null;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && /timeout|timed out/i.test(`${error.name} ${error.message}`);
}

/**
 * Translate an SDK failure into the error classes the retry policy and the
 * job failure record understand.
 */
export function toProviderError(service: string, error: unknown): AppError {
  if (AppError.isAppError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status = upstreamStatusOf(error);
  if (status !== undefined) {
    return fromUpstreamStatus(service, status, message, retryAfterOf(error));
  }
  if (isTimeout(error)) {
    return new TimeoutError(`${service}: ${message}`, { cause: error });
  }
  return new ExternalServiceError(`${service}: ${message}`, service, { cause: error });
}
