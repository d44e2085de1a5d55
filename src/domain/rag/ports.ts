import type { DistanceMetric } from "@config/index";
import type {
  Chunk,
  ChunkFilter,
  Document,
  DocumentSummary,
  Embedding,
  EmbeddingKind,
  ScoredChunk,
} from "@domain/rag/model";

/**
 * Domain port for turning text into vectors.
 *
 * Implementations normalize their input, reject empty text with
 * ValidationError, surface unreachable backends as ProviderUnavailable and
 * refuse vectors of the wrong length with ModelVersionMismatch.
 */
export interface EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;

  embed(
    text: string,
    kind: EmbeddingKind,
    signal?: AbortSignal
  ): Promise<Embedding>;

  embedBatch(
    texts: readonly string[],
    kind: EmbeddingKind,
    signal?: AbortSignal
  ): Promise<Embedding[]>;
}

export interface CollectionSpec {
  name: string;
  dimension: number;
  metric: DistanceMetric;
  model: string;
}

/**
 * Domain port for the vector-capable store.
 *
 * One implementation per backend: PgVectorStore for PostgreSQL + pgvector and
 * InMemoryVectorStore for tests and local runs without a database.
 */
export interface VectorStore {
  readonly collection: CollectionSpec;

  /** Creates storage when missing; ModelVersionMismatch when it disagrees. */
  ensureCollection(): Promise<void>;

  upsertDocument(document: Document): Promise<void>;
  /** Newest document stored under the source, if any. */
  findDocumentBySource(sourceRef: string): Promise<Document | null>;
  /** Oldest first. */
  listDocuments(): Promise<DocumentSummary[]>;

  /** Idempotent by chunk id; replaces any previous embedding. */
  upsert(chunk: Chunk, embedding: Embedding): Promise<void>;

  /**
   * Up to k chunks by descending similarity, ties by ascending chunk id.
   * DimensionMismatch when the query vector has the wrong length.
   */
  search(
    queryEmbedding: Embedding,
    k: number,
    filter?: ChunkFilter
  ): Promise<ScoredChunk[]>;

  /** Removes the document and every chunk that belongs to it; false when unknown. */
  delete(documentId: string): Promise<boolean>;
}
