/**
 * Composition root. Builds every adapter from the frozen config once and
 * hands the wired services to the HTTP layer.
 */
import { IngestService } from "@app/ingest/IngestUseCase";
import { CacheLayer } from "@domain/cache/cacheLayer";
import { DEFAULT_SYSTEM_PROMPT } from "@domain/rag/promptBuilder";
import { RagOrchestrator } from "@domain/rag/orchestrator";
import { SessionManager } from "@domain/session/sessionManager";
import { NoopCacheStore } from "@infrastructure/cache/NoopCacheStore";
import { RedisCacheStore, createRedisClient } from "@infrastructure/cache/RedisCacheStore";
import { createPool } from "@infrastructure/database/db";
import { PgVectorStore } from "@infrastructure/database/PgVectorStore";
import { PostgresSessionStore } from "@infrastructure/database/PostgresSessionStore";
import { OpenAIEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import { InferenceGateway } from "@infrastructure/llm/InferenceGateway";
import { OpenAIChatClient, createOpenAIClient } from "@infrastructure/llm/OpenAIAdapter";
import { InMemorySessionStore } from "@infrastructure/memory/InMemorySessionStore";

import type { AppConfig } from "@config/index";
import type { CacheStore } from "@domain/cache/ports";
import type { VectorStore } from "@domain/rag/ports";
import type { LoggerPort } from "@infrastructure/logging/Logger";
import type { RetryPolicy } from "@infrastructure/llm/retry";

export interface Container {
  config: AppConfig;
  logger: LoggerPort;
  orchestrator: RagOrchestrator;
  ingest: IngestService;
  sessions: SessionManager;
  vectorStore: VectorStore;
  cache: CacheLayer;
  chatClient: OpenAIChatClient;
  /** Prepares storage; fails with ModelVersionMismatch on a stale collection. */
  start(): Promise<void>;
  close(): Promise<void>;
}

export function createContainer(config: AppConfig, logger: LoggerPort): Container {
  const pool = createPool(config, logger);
  const openai = createOpenAIClient(config);
  const chatClient = new OpenAIChatClient(openai);

  const basePolicy = {
    maxRetries: config.resilience.maxRetries,
    baseDelayMs: config.resilience.retryBaseDelayMs,
  };
  const embeddingPolicy: RetryPolicy = {
    ...basePolicy,
    timeoutMs: config.resilience.timeouts.embeddingMs,
  };
  const generationPolicy: RetryPolicy = {
    ...basePolicy,
    timeoutMs: config.resilience.timeouts.generationMs,
  };

  const embedder = new OpenAIEmbeddingProvider({
    client: openai,
    model: config.models.embeddingModel,
    dimension: config.models.embeddingDimension,
    policy: embeddingPolicy,
    logger,
  });

  const systemPrompt = config.models.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  const generation = {
    maxTokens: config.generation.maxTokens,
    temperature: config.generation.temperature,
    stopSequences: config.generation.stopSequences,
  };

  const inference = new InferenceGateway({
    client: chatClient,
    model: config.models.llmModel,
    systemPrompt,
    policy: generationPolicy,
    logger,
    defaults: generation,
  });

  const vectorStore = new PgVectorStore(pool, {
    name: config.rag.collection,
    dimension: config.models.embeddingDimension,
    metric: config.rag.metric,
    model: config.models.embeddingModel,
  });

  const postgresSessions =
    config.session.store === "postgres"
      ? new PostgresSessionStore(pool, config.rag.collection)
      : null;
  const sessions = new SessionManager(
    postgresSessions ?? new InMemorySessionStore(),
    { maxTurns: config.session.maxTurns, maxTokens: config.session.maxTokens },
    logger
  );

  const cacheStore: CacheStore = config.cache.enabled
    ? new RedisCacheStore(createRedisClient(config, logger))
    : new NoopCacheStore();
  const cache = new CacheLayer(cacheStore, {
    defaultTtlSeconds: config.cache.cacheTtl,
    logger,
  });

  const orchestrator = new RagOrchestrator({
    embedder,
    vectorStore,
    inference,
    cache,
    sessions,
    logger,
    settings: {
      topK: config.rag.topK,
      tokenBudget: config.rag.tokenBudget,
      minScore: config.rag.minScore,
      systemPrompt,
      generation,
      historyTokens: config.session.maxTokens,
    },
  });

  const ingest = new IngestService({
    embedder,
    vectorStore,
    cache,
    logger,
    chunkTokens: config.ingest.chunkTokens,
  });

  return {
    config,
    logger,
    orchestrator,
    ingest,
    sessions,
    vectorStore,
    cache,
    chatClient,

    async start() {
      await vectorStore.ensureCollection();
      await postgresSessions?.ensureSchema();
      logger.event("STORAGE_READY", {
        collection: config.rag.collection,
        sessionStore: config.session.store,
        cacheStore: cacheStore.name,
      });
    },

    async close() {
      await cacheStore.close?.();
      await pool.end();
    },
  };
}
