/**
 * RAG orchestration engine.
 *
 * Runs one query through RECEIVED → EMBEDDING → RETRIEVING → ASSEMBLING →
 * GENERATING → COMPLETED. A query either completes, with its turn committed
 * and its cache entries written, or fails with a single AppError and leaves
 * no trace: cache writes are queued while the query runs and flushed only
 * after the turn is committed.
 *
 * DimensionMismatch and ModelVersionMismatch mean the collection and the
 * configured models disagree. The first one seen is latched and every later
 * query is refused with it until the process restarts.
 */
import crypto from "crypto";

import { CacheLayer } from "@domain/cache/cacheLayer";
import { assemble, renderContext } from "@domain/rag/contextAssembler";
import { buildPrompt, scaffoldingTokens } from "@domain/rag/promptBuilder";
import { QueryStateMachine } from "@domain/rag/queryState";
import {
  InfrastructureError,
  QueryCancelled,
  ValidationError,
  errorMessage,
  isAppError,
} from "@typesLocal/AppError";
import { throwIfAborted } from "@utils/abort";
import { normalizeText } from "@utils/text";
import { estimateTokens } from "@utils/tokens";
import { z } from "zod";

import type { Embedding, ScoredChunk } from "@domain/rag/model";
import type { EmbeddingProvider, VectorStore } from "@domain/rag/ports";
import type { QueryState } from "@domain/rag/queryState";
import type { GenerationOptions, InferencePort } from "@domain/llm/ports";
import type { SessionManager } from "@domain/session/sessionManager";
import type { LoggerPort } from "@infrastructure/logging/Logger";
import type { AppError } from "@typesLocal/AppError";

export interface AskRequest {
  sessionId: string;
  queryText: string;
  /** Restricts retrieval to these document ids. */
  documentFilter?: readonly string[];
}

export interface AskOptions {
  signal?: AbortSignal;
  /** Receives answer fragments as they arrive; switches generation to streaming. */
  onToken?: (fragment: string) => void;
  onStateChange?: (state: QueryState) => void;
}

export interface LatencyBreakdown {
  embeddingMs: number;
  retrievalMs: number;
  assemblyMs: number;
  generationMs: number;
  commitMs: number;
  totalMs: number;
  embeddingCacheHit: boolean;
  generationCacheHit: boolean;
}

export interface AskResult {
  turnId: string;
  answerText: string;
  citedChunkIds: string[];
  retrievedChunkIds: string[];
  latencyBreakdown: LatencyBreakdown;
}

export interface OrchestratorSettings {
  topK: number;
  tokenBudget: number;
  minScore: number;
  systemPrompt: string;
  generation: GenerationOptions & { maxTokens: number };
  /** Token ceiling for history replayed into the prompt. */
  historyTokens: number;
}

export interface RagOrchestratorDeps {
  embedder: EmbeddingProvider;
  vectorStore: VectorStore;
  inference: InferencePort;
  cache: CacheLayer;
  sessions: SessionManager;
  logger: LoggerPort;
  settings: OrchestratorSettings;
  now?: () => number;
  newId?: () => string;
}

const EmbeddingValuesSchema = z.array(z.number());
const GenerationEntrySchema = z.object({ text: z.string() });

type PendingWrite = () => Promise<void>;

export class RagOrchestrator {
  private fatalError: AppError | null = null;
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(private readonly deps: RagOrchestratorDeps) {
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? (() => crypto.randomUUID());
  }

  /** The latched configuration error, if any. */
  get fatal(): AppError | null {
    return this.fatalError;
  }

  async ask(request: AskRequest, options: AskOptions = {}): Promise<AskResult> {
    if (this.fatalError) {
      throw this.fatalError;
    }

    const { inference, cache, sessions, logger, settings } = this.deps;
    const { signal, onToken } = options;
    const startedAt = this.now();

    const machine = new QueryStateMachine(
      { status: "RECEIVED", queryText: request.queryText },
      (state) => {
        logger.event("RAG_QUERY_STATE", { sessionId: request.sessionId, status: state.status });
        options.onStateChange?.(state);
      }
    );

    const pendingWrites: PendingWrite[] = [];
    const latency: LatencyBreakdown = {
      embeddingMs: 0,
      retrievalMs: 0,
      assemblyMs: 0,
      generationMs: 0,
      commitMs: 0,
      totalMs: 0,
      embeddingCacheHit: false,
      generationCacheHit: false,
    };

    try {
      const query = normalizeText(request.queryText);
      if (!query) {
        throw new ValidationError("Query text is empty");
      }
      throwIfAborted(signal);

      machine.transition({ status: "EMBEDDING", query });
      let mark = this.now();
      const embedded = await this.embedQuery(query, pendingWrites, signal);
      latency.embeddingMs = this.now() - mark;
      latency.embeddingCacheHit = embedded.cacheHit;
      throwIfAborted(signal);

      machine.transition({ status: "RETRIEVING", query, embedding: embedded.embedding });
      mark = this.now();
      const retrieved = await this.retrieve(embedded.embedding, settings.topK, request.documentFilter);
      latency.retrievalMs = this.now() - mark;
      throwIfAborted(signal);

      machine.transition({ status: "ASSEMBLING", query, retrieved });
      mark = this.now();
      const history = await sessions.recentHistory(request.sessionId, settings.historyTokens);
      const contextBudget =
        settings.tokenBudget -
        scaffoldingTokens(settings.systemPrompt, history, query) -
        settings.generation.maxTokens;
      const cited = assemble(retrieved, contextBudget);
      const context = renderContext(cited);
      const prompt = buildPrompt({ context, history, query });
      latency.assemblyMs = this.now() - mark;

      logger.event("RAG_CONTEXT_ASSEMBLED", {
        sessionId: request.sessionId,
        retrieved: retrieved.length,
        cited: cited.length,
        contextBudget,
        historyTurns: history.length,
      });
      throwIfAborted(signal);

      machine.transition({ status: "GENERATING", prompt, cited });
      mark = this.now();
      const generationKey = CacheLayer.key(
        prompt,
        "generation",
        JSON.stringify([inference.model, settings.systemPrompt, settings.generation])
      );
      let answerText: string;
      const cachedAnswer = await cache.get(generationKey, GenerationEntrySchema);

      if (cachedAnswer) {
        answerText = cachedAnswer.text;
        latency.generationCacheHit = true;
        onToken?.(answerText);
      } else if (onToken) {
        answerText = "";
        for await (const fragment of inference.stream(prompt, settings.generation, signal)) {
          answerText += fragment;
          onToken(fragment);
        }
      } else {
        const result = await inference.generate(prompt, settings.generation, signal);
        answerText = result.text;
      }
      latency.generationMs = this.now() - mark;

      if (!latency.generationCacheHit) {
        const text = answerText;
        pendingWrites.push(() => cache.set(generationKey, { text }));
      }

      // Last point where the caller can still walk away without side effects.
      throwIfAborted(signal);

      mark = this.now();
      const turnId = this.newId();
      await sessions.commit({
        id: turnId,
        sessionId: request.sessionId,
        query,
        retrievedChunkIds: retrieved.map((r) => r.chunk.id),
        citedChunkIds: cited.map((c) => c.id),
        context,
        answer: answerText,
        tokenCount: estimateTokens(query) + estimateTokens(answerText),
        createdAt: new Date(this.now()),
      });
      latency.commitMs = this.now() - mark;

      machine.transition({ status: "COMPLETED", answerText });

      for (const write of pendingWrites) {
        await write();
      }

      latency.totalMs = this.now() - startedAt;
      logger.event("RAG_QUERY_COMPLETED", {
        sessionId: request.sessionId,
        turnId,
        ...latency,
      });

      return {
        turnId,
        answerText,
        citedChunkIds: cited.map((c) => c.id),
        retrievedChunkIds: retrieved.map((r) => r.chunk.id),
        latencyBreakdown: latency,
      };
    } catch (error: unknown) {
      const failure = this.toAppError(error, signal);
      const failedIn = machine.current.status;
      machine.fail(failure);

      if (failure.fatal && !this.fatalError) {
        this.fatalError = failure;
        logger.log("error", "RAG_FATAL_LATCHED", {
          code: failure.type,
          message: failure.message,
        });
      }

      logger.log(failure instanceof QueryCancelled ? "info" : "error", "RAG_QUERY_FAILED", {
        sessionId: request.sessionId,
        failedIn,
        code: failure.type,
        message: failure.message,
        durationMs: this.now() - startedAt,
      });

      throw failure;
    }
  }

  /**
   * Embedding plus similarity search without generation; backs the internal
   * search endpoint. Cache entries are written immediately since no turn is
   * involved.
   */
  async search(
    queryText: string,
    limit: number,
    documentFilter?: readonly string[],
    signal?: AbortSignal
  ): Promise<ScoredChunk[]> {
    if (this.fatalError) {
      throw this.fatalError;
    }

    const query = normalizeText(queryText);
    if (!query) {
      throw new ValidationError("Query text is empty");
    }

    try {
      const pendingWrites: PendingWrite[] = [];
      const { embedding } = await this.embedQuery(query, pendingWrites, signal);
      const results = await this.retrieve(embedding, limit, documentFilter);
      for (const write of pendingWrites) {
        await write();
      }
      return results;
    } catch (error: unknown) {
      const failure = this.toAppError(error, signal);
      if (failure.fatal && !this.fatalError) {
        this.fatalError = failure;
      }
      throw failure;
    }
  }

  private async embedQuery(
    query: string,
    pendingWrites: PendingWrite[],
    signal: AbortSignal | undefined
  ): Promise<{ embedding: Embedding; cacheHit: boolean }> {
    const { embedder, cache } = this.deps;
    const key = CacheLayer.key(query, "embedding", `${embedder.model}:query`);

    const cached = await cache.get(key, EmbeddingValuesSchema);
    if (cached && cached.length === embedder.dimension) {
      return { embedding: { values: cached, model: embedder.model }, cacheHit: true };
    }

    const embedding = await embedder.embed(query, "query", signal);
    pendingWrites.push(() => cache.set(key, embedding.values));
    return { embedding, cacheHit: false };
  }

  private async retrieve(
    embedding: Embedding,
    k: number,
    documentFilter: readonly string[] | undefined
  ): Promise<ScoredChunk[]> {
    const { vectorStore, logger, settings } = this.deps;

    const raw = await vectorStore.search(
      embedding,
      k,
      documentFilter ? { documentIds: documentFilter } : undefined
    );
    const kept = raw.filter((r) => r.score >= settings.minScore);

    logger.event("RAG_SEARCH", {
      collection: vectorStore.collection.name,
      topK: k,
      minScore: settings.minScore,
      rawCount: raw.length,
      keptCount: kept.length,
    });

    return kept;
  }

  private toAppError(error: unknown, signal: AbortSignal | undefined): AppError {
    if (isAppError(error)) {
      if (signal?.aborted && !error.fatal) {
        return error instanceof QueryCancelled ? error : new QueryCancelled();
      }
      return error;
    }
    if (signal?.aborted) {
      return new QueryCancelled();
    }
    return new InfrastructureError(errorMessage(error), { cause: error });
  }
}
