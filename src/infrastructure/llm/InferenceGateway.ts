/**
 * Resilient front door to the model server.
 *
 * generate(): every attempt is bounded by the generation timeout; transient
 * failures are retried with exponential backoff and end in GenerationFailed
 * carrying the last underlying error.
 *
 * stream(): retries only until the first fragment arrives. From then on the
 * timeout bounds the wait for each fragment, and any failure is final.
 * Leaving the loop early or aborting the caller's signal aborts the upstream
 * request.
 */
import {
  AttemptTimeoutError,
  RetryExhaustedError,
  backoffDelay,
  isTransientError,
  withRetry,
} from "@infrastructure/llm/retry";
import { GenerationFailed, QueryCancelled, errorMessage } from "@typesLocal/AppError";
import { linkAbort, sleep } from "@utils/abort";

import type {
  ChatCompletionClient,
  CompletionRequest,
  GenerationOptions,
  GenerationResult,
  InferencePort,
} from "@domain/llm/ports";
import type { RetryPolicy } from "@infrastructure/llm/retry";
import type { LoggerPort } from "@infrastructure/logging/Logger";
import type { LinkedAbort } from "@utils/abort";

export interface InferenceGatewayOptions {
  client: ChatCompletionClient;
  model: string;
  systemPrompt: string;
  policy: RetryPolicy;
  logger: LoggerPort;
  defaults?: GenerationOptions;
}

async function nextFragment(
  iterator: AsyncIterator<string>,
  linked: LinkedAbort,
  timeoutMs: number,
  operation: string
): Promise<IteratorResult<string>> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const timeout = new AttemptTimeoutError(operation, timeoutMs);
      reject(timeout);
      linked.abort(timeout);
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    onAbort = () => reject(new QueryCancelled(`${operation} cancelled`));
    if (linked.signal.aborted) onAbort();
    else linked.signal.addEventListener("abort", onAbort, { once: true });
  });

  const step = iterator.next();
  // Only the first settled promise matters.
  step.catch(() => undefined);
  deadline.catch(() => undefined);
  cancelled.catch(() => undefined);

  try {
    return await Promise.race([step, deadline, cancelled]);
  } finally {
    clearTimeout(timer);
    if (onAbort) linked.signal.removeEventListener("abort", onAbort);
  }
}

export class InferenceGateway implements InferencePort {
  readonly model: string;

  constructor(private readonly options: InferenceGatewayOptions) {
    this.model = options.model;
  }

  async generate(
    prompt: string,
    options: GenerationOptions = {},
    signal?: AbortSignal
  ): Promise<GenerationResult> {
    const { client, policy, logger } = this.options;
    const request = this.buildRequest(prompt, options);
    const startedAt = Date.now();
    let attempts = 0;

    try {
      const response = await withRetry(
        (attemptSignal, attempt) => {
          attempts = attempt;
          return client.complete(request, attemptSignal);
        },
        { operation: "llm.generate", policy, logger, signal }
      );

      logger.event("LLM_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        attempts,
        promptLength: prompt.length,
        finishReason: response.finishReason,
      });

      return {
        text: response.text,
        model: this.model,
        finishReason: response.finishReason,
        attempts,
      };
    } catch (error: unknown) {
      throw this.toFailure(error, attempts, startedAt);
    }
  }

  async *stream(
    prompt: string,
    options: GenerationOptions = {},
    signal?: AbortSignal
  ): AsyncIterable<string> {
    const { client, policy, logger } = this.options;
    const request = this.buildRequest(prompt, options);
    const operation = "llm.stream";
    const maxAttempts = policy.maxRetries + 1;
    const startedAt = Date.now();

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (attempt > 1) {
        await sleep(backoffDelay(attempt - 1, policy.baseDelayMs), signal);
      }
      if (signal?.aborted) {
        throw new QueryCancelled(`${operation} cancelled`);
      }

      const linked = linkAbort(signal);
      const iterator = client.stream(request, linked.signal)[Symbol.asyncIterator]();
      let started = false;
      let waiting = true;

      try {
        let result = await nextFragment(iterator, linked, policy.timeoutMs, operation);
        started = true;
        waiting = false;

        while (!result.done) {
          yield result.value;
          waiting = true;
          result = await nextFragment(iterator, linked, policy.timeoutMs, operation);
          waiting = false;
        }

        logger.event("LLM_SUCCESS", {
          model: this.model,
          durationMs: Date.now() - startedAt,
          attempts: attempt,
          promptLength: prompt.length,
          streamed: true,
        });
        return;
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw new QueryCancelled(`${operation} cancelled`);
        }

        const retryable = !started && isTransientError(error) && attempt < maxAttempts;
        if (!retryable) {
          throw this.toFailure(
            !started && isTransientError(error)
              ? new RetryExhaustedError(operation, attempt, error)
              : error,
            attempt,
            startedAt
          );
        }

        logger.log("warn", "LLM_RETRY", {
          operation,
          attempt,
          error: errorMessage(error),
        });
      } finally {
        linked.abort(new QueryCancelled(`${operation} closed`));
        linked.dispose();
        // A step still in flight holds the generator; its return() settles after it.
        const closing = iterator.return?.().catch(() => undefined);
        if (!waiting) await closing;
      }
    }
  }

  private buildRequest(prompt: string, options: GenerationOptions): CompletionRequest {
    const defaults = this.options.defaults ?? {};
    const stop = options.stopSequences ?? defaults.stopSequences;
    return {
      model: this.model,
      messages: [
        { role: "system", content: this.options.systemPrompt },
        { role: "user", content: prompt },
      ],
      maxTokens: options.maxTokens ?? defaults.maxTokens,
      temperature: options.temperature ?? defaults.temperature,
      stop: stop ? [...stop] : undefined,
    };
  }

  private toFailure(error: unknown, attempts: number, startedAt: number): Error {
    if (error instanceof QueryCancelled) {
      return error;
    }

    const exhausted = error instanceof RetryExhaustedError;
    const cause = exhausted ? error.cause : error;

    this.options.logger.event("LLM_FAILURE", {
      model: this.model,
      durationMs: Date.now() - startedAt,
      attempts: exhausted ? error.attempts : attempts,
      message: errorMessage(cause),
    });

    return new GenerationFailed(`Generation failed: ${errorMessage(cause)}`, cause, {
      model: this.model,
      attempts: exhausted ? error.attempts : attempts,
    });
  }
}
