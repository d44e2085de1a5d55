/**
 * Embedding adapter over the model server's OpenAI-compatible embeddings API.
 *
 * Text is normalized before it leaves the process so that equal inputs hit
 * the same cache key and produce the same vector. Models of the
 * nomic-embed-text family are trained with task prefixes and get them here.
 */
import { RetryExhaustedError, withRetry } from "@infrastructure/llm/retry";
import {
  ModelVersionMismatch,
  ProviderUnavailable,
  QueryCancelled,
  ValidationError,
  errorMessage,
} from "@typesLocal/AppError";
import { normalizeText } from "@utils/text";

import type { Embedding, EmbeddingKind } from "@domain/rag/model";
import type { EmbeddingProvider } from "@domain/rag/ports";
import type { RetryPolicy } from "@infrastructure/llm/retry";
import type { LoggerPort } from "@infrastructure/logging/Logger";

export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string | string[] },
      options?: { signal?: AbortSignal; maxRetries?: number }
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  client: EmbeddingsClient;
  model: string;
  dimension: number;
  policy: RetryPolicy;
  logger: LoggerPort;
}

const TASK_PREFIXES: Record<EmbeddingKind, string> = {
  query: "search_query: ",
  document: "search_document: ",
};

export function taskPrefix(model: string, kind: EmbeddingKind): string {
  return model.toLowerCase().startsWith("nomic-embed-text") ? TASK_PREFIXES[kind] : "";
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;

  constructor(private readonly options: OpenAIEmbeddingProviderOptions) {
    this.model = options.model;
    this.dimension = options.dimension;
  }

  async embed(text: string, kind: EmbeddingKind, signal?: AbortSignal): Promise<Embedding> {
    const [embedding] = await this.request([text], kind, signal);
    if (!embedding) {
      throw new ProviderUnavailable("Embedding API returned no vector", undefined, {
        model: this.model,
      });
    }
    return embedding;
  }

  async embedBatch(
    texts: readonly string[],
    kind: EmbeddingKind,
    signal?: AbortSignal
  ): Promise<Embedding[]> {
    if (texts.length === 0) {
      return [];
    }
    return this.request(texts, kind, signal);
  }

  private async request(
    texts: readonly string[],
    kind: EmbeddingKind,
    signal: AbortSignal | undefined
  ): Promise<Embedding[]> {
    const prefix = taskPrefix(this.model, kind);
    const inputs = texts.map((text, index) => {
      const normalized = normalizeText(text);
      if (!normalized) {
        throw new ValidationError("Cannot embed empty text", { index });
      }
      return prefix + normalized;
    });

    const { client, policy, logger } = this.options;
    const startedAt = Date.now();

    let response: Awaited<ReturnType<EmbeddingsClient["embeddings"]["create"]>>;
    try {
      response = await withRetry(
        (attemptSignal) =>
          client.embeddings.create(
            { model: this.model, input: inputs.length === 1 ? inputs[0] ?? "" : inputs },
            { signal: attemptSignal, maxRetries: 0 }
          ),
        { operation: "embeddings.create", policy, logger, signal }
      );
    } catch (error: unknown) {
      if (error instanceof QueryCancelled) {
        throw error;
      }

      const cause = error instanceof RetryExhaustedError ? error.cause : error;
      logger.event("EMBEDDING_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        batchSize: inputs.length,
        message: errorMessage(cause),
      });
      throw new ProviderUnavailable(`Embedding request failed: ${errorMessage(cause)}`, cause, {
        model: this.model,
      });
    }

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== inputs.length) {
      throw new ProviderUnavailable(
        `Embedding API returned ${ordered.length} vectors for ${inputs.length} inputs`,
        undefined,
        { model: this.model }
      );
    }

    const embeddings = ordered.map((item) => {
      if (item.embedding.length !== this.dimension) {
        throw new ModelVersionMismatch(
          `Model "${this.model}" returned ${item.embedding.length}-dimensional vectors; ${this.dimension} configured`,
          { model: this.model, expected: this.dimension, actual: item.embedding.length }
        );
      }
      return { values: item.embedding, model: this.model };
    });

    logger.event("EMBEDDING_SUCCESS", {
      model: this.model,
      kind,
      durationMs: Date.now() - startedAt,
      batchSize: inputs.length,
      vectorLength: this.dimension,
    });

    return embeddings;
  }
}
