import { QueryCancelled, errorMessage } from "@typesLocal/AppError";
import { linkAbort, sleep } from "@utils/abort";

import type { LoggerPort } from "@infrastructure/logging/Logger";

export interface RetryPolicy {
  /** Retries after the first attempt; 2 means up to 3 attempts. */
  maxRetries: number;
  /** Delay before retry n is baseDelayMs * 2^(n-1). */
  baseDelayMs: number;
  /** Per-attempt deadline. */
  timeoutMs: number;
}

export interface RetryContext {
  operation: string;
  policy: RetryPolicy;
  logger: LoggerPort;
  signal?: AbortSignal | undefined;
  isRetryable?: (error: unknown) => boolean;
}

export class AttemptTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(`${operation} failed after ${attempts} attempt(s): ${errorMessage(cause)}`, {
      cause,
    });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
]);
const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" ? value : undefined;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Timeouts, socket-level failures, rate limits and 5xx responses are
 * transient; everything else (bad request, auth, schema errors) is not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof AttemptTimeoutError) {
    return true;
  }
  if (!error || typeof error !== "object") {
    return false;
  }

  const cause: unknown = Reflect.get(error, "cause");
  const code =
    readString(error, "code") ??
    (cause && typeof cause === "object" ? readString(cause, "code") : undefined);
  if (code && RETRYABLE_CODES.has(code)) {
    return true;
  }

  const status = readNumber(error, "status") ?? readNumber(error, "statusCode");
  if (status !== undefined) {
    return RETRYABLE_STATUSES.has(status);
  }

  const name = readString(error, "name");
  if (name === "APIConnectionError" || name === "APIConnectionTimeoutError") {
    return true;
  }

  const message = readString(error, "message")?.toLowerCase() ?? "";
  return message.includes("fetch failed") || message.includes("socket hang up");
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
}

/**
 * Runs `fn` with a fresh AbortSignal per attempt that fires on the attempt
 * deadline or when the caller's signal aborts. Caller aborts surface as
 * QueryCancelled and are never retried; the final transient failure is
 * wrapped in RetryExhaustedError with the underlying error as cause.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  ctx: RetryContext
): Promise<T> {
  const { operation, policy, logger, signal } = ctx;
  const isRetryable = ctx.isRetryable ?? isTransientError;
  const maxAttempts = policy.maxRetries + 1;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    if (attempt > 1) {
      await sleep(backoffDelay(attempt - 1, policy.baseDelayMs), signal);
    }

    if (signal?.aborted) {
      throw new QueryCancelled(`${operation} cancelled`);
    }

    const linked = linkAbort(signal);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const timeout = new AttemptTimeoutError(operation, policy.timeoutMs);
        linked.abort(timeout);
        reject(timeout);
      }, policy.timeoutMs);
    });
    const cancelled = new Promise<never>((_, reject) => {
      linked.signal.addEventListener(
        "abort",
        () => {
          if (signal?.aborted) reject(new QueryCancelled(`${operation} cancelled`));
        },
        { once: true }
      );
    });

    const attemptPromise = fn(linked.signal, attempt);
    // The losing side of the race settles later; its outcome is already decided.
    attemptPromise.catch(() => undefined);
    deadline.catch(() => undefined);
    cancelled.catch(() => undefined);

    try {
      return await Promise.race([attemptPromise, deadline, cancelled]);
    } catch (e: unknown) {
      if (signal?.aborted) {
        throw new QueryCancelled(`${operation} cancelled`);
      }

      lastError = e;

      if (!isRetryable(lastError)) {
        throw lastError;
      }

      if (attempt < maxAttempts) {
        logger.log("warn", "LLM_RETRY", {
          operation,
          attempt,
          error: errorMessage(lastError),
        });
      }
    } finally {
      clearTimeout(timer);
      linked.dispose();
    }
  }

  throw new RetryExhaustedError(operation, maxAttempts, lastError);
}
