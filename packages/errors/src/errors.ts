import type { PipelinePhase } from "@indexflow/types";
import { AppError, describeError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorExtras) {
    super({ message, statusCode: 409, code: "CONFLICT", ...options });
  }
}

export class InvalidTransitionError extends AppError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string, options?: ErrorExtras) {
    super({
      message: `Invalid job status transition: ${from} -> ${to}`,
      statusCode: 409,
      code: "INVALID_TRANSITION",
      ...options,
    });
    this.from = from;
    this.to = to;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class InsufficientCreditsError extends AppError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number, options?: ErrorExtras) {
    super({
      message: `Insufficient credits: requested ${String(requested)}, available ${String(available)}`,
      statusCode: 402,
      code: "INSUFFICIENT_CREDITS",
      ...options,
    });
    this.requested = requested;
    this.available = available;
  }
}

export class UnsupportedMimeTypeError extends AppError {
  public readonly mimeType: string;

  constructor(mimeType: string, options?: ErrorExtras) {
    super({
      message: `Unsupported MIME type for text extraction: ${mimeType}`,
      statusCode: 415,
      code: "UNSUPPORTED_MIME_TYPE",
      ...options,
    });
    this.mimeType = mimeType;
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the upstream asked us to wait, when it said so. */
  public readonly retryAfter: number | null;

  constructor(message = "Rate limited", retryAfter: number | null = null, options?: ErrorExtras) {
    super({ message, statusCode: 429, code: "RATE_LIMITED", ...options });
    this.retryAfter = retryAfter;
  }
}

export class TimeoutError extends AppError {
  constructor(message = "Operation timed out", options?: ErrorExtras) {
    super({ message, statusCode: 504, code: "TIMEOUT", ...options });
  }
}

/** Upstream provider failed in a way worth retrying (5xx, dropped connection). */
export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...options });
    this.service = service;
  }
}

/** Upstream provider refused the request (4xx other than 429); retrying will not help. */
export class ProviderRejectedError extends AppError {
  public readonly service: string;
  public readonly upstreamStatus: number;

  constructor(message: string, service: string, upstreamStatus: number, options?: ErrorExtras) {
    super({ message, statusCode: 422, code: "PROVIDER_REJECTED", ...options });
    this.service = service;
    this.upstreamStatus = upstreamStatus;
  }
}

export class PhaseError extends AppError {
  public readonly phase: PipelinePhase;

  constructor(phase: PipelinePhase, cause: unknown) {
    const inner = describeError(cause);
    super({
      message: `Phase ${phase} failed: ${inner.message}`,
      statusCode: AppError.isAppError(cause) ? cause.statusCode : 500,
      code: inner.code,
      details: { phase },
      cause,
    });
    this.phase = phase;
  }
}
