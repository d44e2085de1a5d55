/**
 * Centralized configuration for the Javis RAG engine.
 *
 * Built once at process start from environment variables, validated with zod
 * and deep-frozen. The resulting object is passed by reference to every
 * component; nothing reads `process.env` after startup.
 */
import path from "path";

import { ValidationError } from "@typesLocal/AppError";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: positiveInt.default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434/v1"),
  OLLAMA_API_KEY: z.string().min(1).default("ollama"),
  EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
  EMBEDDING_DIMENSION: positiveInt.default(768),
  LLM_MODEL: z.string().min(1).default("llama3.2"),
  SYSTEM_PROMPT: z.string().optional(),

  DB_HOST: z.string().default("localhost"),
  DB_PORT: positiveInt.default(5432),
  DB_USER: z.string().default("postgres"),
  DB_PASSWORD: z.string().default("postgres"),
  DB_NAME: z.string().default("javis"),
  DB_POOL_MAX: positiveInt.default(10),
  DB_IDLE_TIMEOUT_MS: positiveInt.default(30000),
  DB_CONN_TIMEOUT_MS: positiveInt.default(10000),

  REDIS_URL: z.string().optional(),
  CACHE_ENABLED: booleanFlag.default("true"),
  CACHE_TTL_SECONDS: nonNegativeInt.default(3600),

  RAG_COLLECTION: z
    .string()
    .regex(/^[a-z_][a-z0-9_]{0,40}$/, "must be a lowercase SQL identifier")
    .default("javis"),
  RAG_DISTANCE_METRIC: z.enum(["cosine", "inner_product"]).default("cosine"),
  RAG_TOP_K: positiveInt.default(5),
  RAG_TOKEN_BUDGET: positiveInt.default(4096),
  RAG_MIN_SCORE: z.coerce.number().default(0),

  GENERATION_MAX_TOKENS: positiveInt.default(512),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  GENERATION_STOP: z.string().optional(),

  MAX_RETRIES: nonNegativeInt.default(2),
  RETRY_BASE_DELAY_MS: nonNegativeInt.default(200),
  REQUEST_TIMEOUT_MS: positiveInt.default(30000),
  EMBEDDING_TIMEOUT_MS: positiveInt.optional(),
  GENERATION_TIMEOUT_MS: positiveInt.optional(),
  VECTOR_STORE_TIMEOUT_MS: positiveInt.optional(),
  CACHE_TIMEOUT_MS: positiveInt.optional(),

  SESSION_STORE: z.enum(["memory", "postgres"]).default("postgres"),
  SESSION_MAX_TURNS: positiveInt.default(20),
  SESSION_MAX_TOKENS: positiveInt.default(2000),

  INGEST_CHUNK_TOKENS: positiveInt.default(200),
});

export type DistanceMetric = "cosine" | "inner_product";
export type LogLevelSetting = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface AppConfig {
  readonly env: string;
  readonly port: number;
  readonly models: {
    readonly baseUrl: string;
    readonly apiKey: string;
    readonly embeddingModel: string;
    readonly embeddingDimension: number;
    readonly llmModel: string;
    readonly systemPrompt: string | undefined;
  };
  readonly db: {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly max: number;
    readonly idleTimeoutMs: number;
    readonly connectionTimeoutMs: number;
  };
  readonly cache: {
    readonly enabled: boolean;
    readonly redisUrl: string | undefined;
    readonly cacheTtl: number;
  };
  readonly rag: {
    readonly collection: string;
    readonly metric: DistanceMetric;
    readonly topK: number;
    readonly tokenBudget: number;
    readonly minScore: number;
  };
  readonly generation: {
    readonly maxTokens: number;
    readonly temperature: number;
    readonly stopSequences: readonly string[];
  };
  readonly resilience: {
    readonly maxRetries: number;
    readonly retryBaseDelayMs: number;
    readonly requestTimeout: number;
    readonly timeouts: {
      readonly embeddingMs: number;
      readonly generationMs: number;
      readonly vectorStoreMs: number;
      readonly cacheMs: number;
    };
  };
  readonly session: {
    readonly store: "memory" | "postgres";
    readonly maxTurns: number;
    readonly maxTokens: number;
  };
  readonly ingest: {
    readonly chunkTokens: number;
  };
  readonly observability: {
    readonly logLevel: LogLevelSetting;
    /** JSON-lines log file; empty disables file output. */
    readonly logFile: string;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function splitList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split("|")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );

  const parsed = EnvSchema.safeParse(cleaned);

  if (!parsed.success) {
    throw new ValidationError("Invalid configuration", {
      issues: parsed.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      })),
    });
  }

  const e = parsed.data;
  const requestTimeout = e.REQUEST_TIMEOUT_MS;

  const config: AppConfig = {
    env: e.NODE_ENV,
    port: e.PORT,

    models: {
      baseUrl: e.OLLAMA_BASE_URL,
      apiKey: e.OLLAMA_API_KEY,
      embeddingModel: e.EMBEDDING_MODEL,
      embeddingDimension: e.EMBEDDING_DIMENSION,
      llmModel: e.LLM_MODEL,
      systemPrompt: e.SYSTEM_PROMPT,
    },

    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      max: e.DB_POOL_MAX,
      idleTimeoutMs: e.DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMs: e.DB_CONN_TIMEOUT_MS,
    },

    cache: {
      enabled: e.CACHE_ENABLED && Boolean(e.REDIS_URL),
      redisUrl: e.REDIS_URL,
      cacheTtl: e.CACHE_TTL_SECONDS,
    },

    rag: {
      collection: e.RAG_COLLECTION,
      metric: e.RAG_DISTANCE_METRIC,
      topK: e.RAG_TOP_K,
      tokenBudget: e.RAG_TOKEN_BUDGET,
      minScore: e.RAG_MIN_SCORE,
    },

    generation: {
      maxTokens: e.GENERATION_MAX_TOKENS,
      temperature: e.GENERATION_TEMPERATURE,
      stopSequences: splitList(e.GENERATION_STOP),
    },

    resilience: {
      maxRetries: e.MAX_RETRIES,
      retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
      requestTimeout,
      timeouts: {
        embeddingMs: e.EMBEDDING_TIMEOUT_MS ?? requestTimeout,
        generationMs: e.GENERATION_TIMEOUT_MS ?? requestTimeout,
        vectorStoreMs: e.VECTOR_STORE_TIMEOUT_MS ?? requestTimeout,
        cacheMs: e.CACHE_TIMEOUT_MS ?? requestTimeout,
      },
    },

    session: {
      store: e.SESSION_STORE,
      maxTurns: e.SESSION_MAX_TURNS,
      maxTokens: e.SESSION_MAX_TOKENS,
    },

    ingest: {
      chunkTokens: e.INGEST_CHUNK_TOKENS,
    },

    observability: {
      logLevel: e.LOG_LEVEL,
      logFile: env.LOG_FILE ?? path.join(process.cwd(), "logs", "app.log"),
    },
  };

  if (config.generation.maxTokens >= config.rag.tokenBudget) {
    throw new ValidationError(
      "GENERATION_MAX_TOKENS must be smaller than RAG_TOKEN_BUDGET",
      {
        maxTokens: config.generation.maxTokens,
        tokenBudget: config.rag.tokenBudget,
      }
    );
  }

  return deepFreeze(config);
}
