/**
 * Process-local VectorStore. Every operation completes synchronously inside
 * its promise, so a search always sees all writes that finished before it.
 */
import { compareScoredChunks } from "@domain/rag/model";
import { DimensionMismatch, ModelVersionMismatch } from "@typesLocal/AppError";
import { cosineSimilarity, dotProduct } from "@utils/vector";

import type {
  Chunk,
  ChunkFilter,
  Document,
  DocumentSummary,
  Embedding,
  ScoredChunk,
} from "@domain/rag/model";
import type { CollectionSpec, VectorStore } from "@domain/rag/ports";

interface StoredChunk {
  chunk: Chunk;
  values: number[];
}

export class InMemoryVectorStore implements VectorStore {
  private readonly documents = new Map<string, Document>();
  private readonly chunks = new Map<string, StoredChunk>();

  constructor(readonly collection: CollectionSpec) {}

  async ensureCollection(): Promise<void> {
    return;
  }

  async upsertDocument(document: Document): Promise<void> {
    this.documents.set(document.id, { ...document });
  }

  async findDocumentBySource(sourceRef: string): Promise<Document | null> {
    let newest: Document | null = null;
    for (const doc of this.documents.values()) {
      if (doc.sourceRef !== sourceRef) continue;
      if (!newest || doc.ingestedAt.getTime() > newest.ingestedAt.getTime()) newest = doc;
    }
    return newest ? { ...newest } : null;
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    return [...this.documents.values()]
      .map(({ id, sourceRef, title, ingestedAt }) => ({ id, sourceRef, title, ingestedAt }))
      .sort((a, b) => a.ingestedAt.getTime() - b.ingestedAt.getTime());
  }

  async upsert(chunk: Chunk, embedding: Embedding): Promise<void> {
    this.assertCompatible(embedding);
    this.chunks.set(chunk.id, { chunk: { ...chunk }, values: [...embedding.values] });
  }

  async search(
    queryEmbedding: Embedding,
    k: number,
    filter?: ChunkFilter
  ): Promise<ScoredChunk[]> {
    this.assertCompatible(queryEmbedding);
    if (k <= 0) return [];

    const allowed = filter?.documentIds ? new Set(filter.documentIds) : null;
    const scored: ScoredChunk[] = [];

    for (const stored of this.chunks.values()) {
      if (allowed && !allowed.has(stored.chunk.documentId)) continue;
      scored.push({
        chunk: { ...stored.chunk },
        score: this.similarity(queryEmbedding.values, stored.values),
      });
    }

    return scored.sort(compareScoredChunks).slice(0, k);
  }

  async delete(documentId: string): Promise<boolean> {
    for (const [id, stored] of this.chunks) {
      if (stored.chunk.documentId === documentId) this.chunks.delete(id);
    }
    return this.documents.delete(documentId);
  }

  /** Number of stored chunk embeddings. */
  get size(): number {
    return this.chunks.size;
  }

  private similarity(a: number[], b: number[]): number {
    return this.collection.metric === "cosine" ? cosineSimilarity(a, b) : dotProduct(a, b);
  }

  private assertCompatible(embedding: Embedding): void {
    if (embedding.values.length !== this.collection.dimension) {
      throw new DimensionMismatch(this.collection.dimension, embedding.values.length, {
        collection: this.collection.name,
      });
    }
    if (embedding.model !== this.collection.model) {
      throw new ModelVersionMismatch(
        `Embedding from model "${embedding.model}" cannot be compared with collection "${this.collection.name}" built with "${this.collection.model}"`,
        { collection: this.collection.name }
      );
    }
  }
}
