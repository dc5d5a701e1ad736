import { AppError } from "./app-error.js";

interface ErrorContext {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorContext) {
    super({
      message,
      statusCode: 409,
      code: "CONFLICT",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorContext) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export type TransientErrorKind = "rate_limited" | "timeout" | "unavailable";

export type PermanentErrorKind = "invalid_input" | "oversized_chunk";

/**
 * Provider failure worth retrying: rate limits, timeouts, 5xx.
 */
export class TransientProviderError extends AppError {
  public readonly kind: TransientErrorKind;
  public readonly provider: string;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    kind: TransientErrorKind,
    provider: string,
    options?: ErrorContext & { retryAfterMs?: number },
  ) {
    super({
      message,
      statusCode: kind === "rate_limited" ? 429 : 503,
      code: kind === "rate_limited" ? "RATE_LIMITED" : "PROVIDER_UNAVAILABLE",
      details: options?.details,
      cause: options?.cause,
    });
    this.kind = kind;
    this.provider = provider;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class PermanentProviderError extends AppError {
  public readonly kind: PermanentErrorKind;
  public readonly provider: string;

  constructor(message: string, kind: PermanentErrorKind, provider: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 422,
      code: kind === "oversized_chunk" ? "OVERSIZED_CHUNK" : "INVALID_INPUT",
      details: options?.details,
      cause: options?.cause,
    });
    this.kind = kind;
    this.provider = provider;
  }
}

export class SourceFetchError extends AppError {
  public readonly sourceId: string;

  constructor(message: string, sourceId: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 502,
      code: "SOURCE_FETCH_FAILED",
      details: options?.details,
      cause: options?.cause,
    });
    this.sourceId = sourceId;
  }
}

/**
 * The finalize invariant would be violated. Never operational: the run
 * must stop rather than publish a partial chunk set.
 */
export class ConsistencyError extends AppError {
  constructor(message: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "CONSISTENCY_VIOLATION",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class BatchEmbeddingError extends AppError {
  public readonly sourceIds: string[];
  public readonly failure: unknown;

  constructor(sourceIds: string[], failure: unknown) {
    const reason = failure instanceof Error ? failure.message : String(failure);
    super({
      message: `Embedding batch failed: ${reason}`,
      statusCode: 502,
      code: "BATCH_EMBEDDING_FAILED",
      details: { sourceIds },
      cause: failure,
    });
    this.sourceIds = sourceIds;
    this.failure = failure;
  }
}

export class InvalidJobTransitionError extends AppError {
  constructor(jobId: string, from: string, to: string) {
    super({
      message: `Job ${jobId} cannot move from ${from} to ${to}`,
      statusCode: 409,
      code: "INVALID_JOB_TRANSITION",
      details: { jobId, from, to },
    });
  }
}
