/**
 * Error taxonomy shared by adapters, the orchestrator and the HTTP layer.
 *
 * Every error carries a stable `type` code and an HTTP status so that the
 * express error handler can render it without knowing where it came from.
 */
export type AppErrorType =
  | "AppError"
  | "DomainError"
  | "InfrastructureError"
  | "ValidationError"
  | "NotFoundError"
  | "ProviderUnavailable"
  | "GenerationFailed"
  | "DimensionMismatch"
  | "ModelVersionMismatch"
  | "CacheUnavailable"
  | "QueryCancelled";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export interface AppErrorOptions {
  statusCode?: number;
  metadata?: AppErrorMetadata;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    options: AppErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = options.statusCode ?? 500;
    this.metadata = options.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Configuration inconsistencies the process must not serve through. */
  get fatal(): boolean {
    return this.type === "DimensionMismatch" || this.type === "ModelVersionMismatch";
  }
}

export class DomainError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "DomainError", { statusCode: 422, metadata });
  }
}

export class InfrastructureError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, "InfrastructureError", { statusCode: 500, ...options });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ValidationError", { statusCode: 400, metadata });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "NotFoundError", { statusCode: 404, metadata });
  }
}

export class ProviderUnavailable extends AppError {
  constructor(message: string, cause?: unknown, metadata?: AppErrorMetadata) {
    super(message, "ProviderUnavailable", { statusCode: 503, cause, metadata });
  }
}

export class GenerationFailed extends AppError {
  constructor(message: string, cause?: unknown, metadata?: AppErrorMetadata) {
    super(message, "GenerationFailed", { statusCode: 502, cause, metadata });
  }
}

export class DimensionMismatch extends AppError {
  constructor(expected: number, actual: number, metadata?: AppErrorMetadata) {
    super(
      `Embedding dimension mismatch: collection expects ${expected}, got ${actual}`,
      "DimensionMismatch",
      { statusCode: 500, metadata: { expected, actual, ...metadata } }
    );
  }
}

export class ModelVersionMismatch extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ModelVersionMismatch", { statusCode: 500, metadata });
  }
}

export class CacheUnavailable extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CacheUnavailable", { statusCode: 503, cause });
  }
}

export class QueryCancelled extends AppError {
  constructor(message = "Query cancelled", metadata?: AppErrorMetadata) {
    super(message, "QueryCancelled", { statusCode: 499, metadata });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
