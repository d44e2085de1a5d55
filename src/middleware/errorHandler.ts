/**
 * Global error handling middleware.
 *
 * Renders every failure as `{ error: { message, code, details } }` with the
 * status its AppError carries. Anything that is not an AppError is reported
 * as an InfrastructureError without leaking internals.
 */
import { InfrastructureError, ValidationError, isAppError } from "@typesLocal/AppError";
import { ZodError } from "zod";

import type { AppError } from "@typesLocal/AppError";
import type { LoggerPort } from "@infrastructure/logging/Logger";

export interface ErrorBody {
  error: {
    message: string;
    code: string;
    details: Record<string, unknown>;
  };
}

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }
  if (err instanceof ZodError) {
    return new ValidationError("Invalid request", {
      issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return new InfrastructureError("Internal Server Error", { cause: err });
}

export function toErrorBody(error: AppError): ErrorBody {
  return {
    error: {
      message: error.message,
      code: error.type,
      details: error.metadata ?? {},
    },
  };
}

/** The part of an express Response the error handler writes to. */
export interface ErrorResponseSink {
  readonly headersSent: boolean;
  status(code: number): { json(body: unknown): unknown };
  end(): unknown;
}

export function createErrorHandler(logger: LoggerPort) {
  return function errorHandler(
    err: unknown,
    _req: unknown,
    res: ErrorResponseSink,
    _next: unknown
  ): void {
    const appError = toAppError(err);
    const status = appError.statusCode;

    logger.log(status >= 500 ? "error" : "warn", "HTTP_ERROR", {
      type: appError.type,
      statusCode: status,
      message: appError.message,
      metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
      originalError: appError === err ? undefined : String(err),
    });

    if (res.headersSent) {
      res.end();
      return;
    }

    res.status(status).json(toErrorBody(appError));
  };
}
