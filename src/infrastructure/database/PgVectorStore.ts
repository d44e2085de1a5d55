import { withTransaction } from "@infrastructure/database/db";
import { DimensionMismatch, ModelVersionMismatch } from "@typesLocal/AppError";
import { toPgVectorLiteral } from "@utils/vector";
import { z } from "zod";

import type { PoolLike } from "@infrastructure/database/db";
import type {
  Chunk,
  ChunkFilter,
  Document,
  DocumentSummary,
  Embedding,
  ScoredChunk,
} from "@domain/rag/model";
import type { CollectionSpec, VectorStore } from "@domain/rag/ports";

const CollectionRowSchema = z.object({
  name: z.string(),
  dimension: z.number(),
  metric: z.string(),
  model: z.string(),
});

const DocumentRowSchema = z.object({
  id: z.string(),
  source_ref: z.string(),
  title: z.string().nullable(),
  raw_text: z.string(),
  ingested_at: z.coerce.date(),
});

const DocumentSummaryRowSchema = DocumentRowSchema.omit({ raw_text: true });

const ScoredChunkRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  ordinal: z.number(),
  content: z.string(),
  token_count: z.number(),
  score: z.coerce.number(),
});

function toDocument(row: unknown): Document {
  const r = DocumentRowSchema.parse(row);
  return {
    id: r.id,
    sourceRef: r.source_ref,
    title: r.title,
    text: r.raw_text,
    ingestedAt: r.ingested_at,
  };
}

/**
 * PostgreSQL + pgvector implementation of the VectorStore port.
 *
 * Each collection owns two tables, `<name>_documents` and `<name>_chunks`,
 * plus a row in `rag_collections` recording the dimension, metric and model
 * the vectors were built with.
 *
 * Similarity:
 * - cosine: 1 - (embedding <=> q)
 * - inner_product: -(embedding <#> q), since pgvector returns the negated
 *   inner product
 */
export class PgVectorStore implements VectorStore {
  private readonly documentsTable: string;
  private readonly chunksTable: string;

  constructor(
    private readonly pool: PoolLike,
    readonly collection: CollectionSpec
  ) {
    if (!/^[a-z_][a-z0-9_]*$/.test(collection.name)) {
      throw new TypeError(`Invalid collection name "${collection.name}"`);
    }
    this.documentsTable = `${collection.name}_documents`;
    this.chunksTable = `${collection.name}_chunks`;
  }

  async ensureCollection(): Promise<void> {
    const { name, dimension, metric, model } = this.collection;
    const opclass = metric === "cosine" ? "vector_cosine_ops" : "vector_ip_ops";

    await withTransaction(this.pool, async (client) => {
      await client.query("CREATE EXTENSION IF NOT EXISTS vector");
      await client.query(`
        CREATE TABLE IF NOT EXISTS rag_collections (
          name TEXT PRIMARY KEY,
          dimension INTEGER NOT NULL,
          metric TEXT NOT NULL,
          model TEXT NOT NULL,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `);

      await client.query(
        `
        INSERT INTO rag_collections (name, dimension, metric, model)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (name) DO NOTHING
        `,
        [name, dimension, metric, model]
      );

      const existing = await client.query(
        "SELECT name, dimension, metric, model FROM rag_collections WHERE name = $1",
        [name]
      );
      const row = CollectionRowSchema.parse(existing.rows[0]);

      if (row.dimension !== dimension || row.model !== model || row.metric !== metric) {
        throw new ModelVersionMismatch(
          `Collection "${name}" was built with ${row.model} (${row.dimension}d, ${row.metric}); configuration asks for ${model} (${dimension}d, ${metric}). Re-index before serving.`,
          { stored: row, configured: { dimension, metric, model } }
        );
      }

      await client.query(`
        CREATE TABLE IF NOT EXISTS ${this.documentsTable} (
          id TEXT PRIMARY KEY,
          source_ref TEXT NOT NULL,
          title TEXT,
          raw_text TEXT NOT NULL,
          ingested_at TIMESTAMPTZ NOT NULL
        )
      `);
      await client.query(`
        CREATE INDEX IF NOT EXISTS ${this.documentsTable}_source_idx
        ON ${this.documentsTable} (source_ref, ingested_at DESC)
      `);
      await client.query(`
        CREATE TABLE IF NOT EXISTS ${this.chunksTable} (
          id TEXT PRIMARY KEY,
          document_id TEXT NOT NULL REFERENCES ${this.documentsTable}(id) ON DELETE CASCADE,
          ordinal INTEGER NOT NULL,
          content TEXT NOT NULL,
          token_count INTEGER NOT NULL,
          embedding vector(${dimension}) NOT NULL
        )
      `);
      await client.query(`
        CREATE INDEX IF NOT EXISTS ${this.chunksTable}_document_idx
        ON ${this.chunksTable} (document_id)
      `);
      await client.query(`
        CREATE INDEX IF NOT EXISTS ${this.chunksTable}_embedding_idx
        ON ${this.chunksTable} USING hnsw (embedding ${opclass})
      `);
    });
  }

  async upsertDocument(document: Document): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO ${this.documentsTable} (id, source_ref, title, raw_text, ingested_at)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT (id) DO UPDATE SET
        source_ref = EXCLUDED.source_ref,
        title = EXCLUDED.title,
        raw_text = EXCLUDED.raw_text,
        ingested_at = EXCLUDED.ingested_at
      `,
      [document.id, document.sourceRef, document.title, document.text, document.ingestedAt]
    );
  }

  async findDocumentBySource(sourceRef: string): Promise<Document | null> {
    const result = await this.pool.query(
      `
      SELECT id, source_ref, title, raw_text, ingested_at
      FROM ${this.documentsTable}
      WHERE source_ref = $1
      ORDER BY ingested_at DESC
      LIMIT 1
      `,
      [sourceRef]
    );
    const row = result.rows[0];
    return row === undefined ? null : toDocument(row);
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const result = await this.pool.query(
      `
      SELECT id, source_ref, title, ingested_at
      FROM ${this.documentsTable}
      ORDER BY ingested_at ASC
      `
    );
    return result.rows.map((row) => {
      const r = DocumentSummaryRowSchema.parse(row);
      return { id: r.id, sourceRef: r.source_ref, title: r.title, ingestedAt: r.ingested_at };
    });
  }

  async upsert(chunk: Chunk, embedding: Embedding): Promise<void> {
    this.assertCompatible(embedding);

    await this.pool.query(
      `
      INSERT INTO ${this.chunksTable} (id, document_id, ordinal, content, token_count, embedding)
      VALUES ($1, $2, $3, $4, $5, $6::vector)
      ON CONFLICT (id) DO UPDATE SET
        document_id = EXCLUDED.document_id,
        ordinal = EXCLUDED.ordinal,
        content = EXCLUDED.content,
        token_count = EXCLUDED.token_count,
        embedding = EXCLUDED.embedding
      `,
      [
        chunk.id,
        chunk.documentId,
        chunk.ordinal,
        chunk.text,
        chunk.tokenCount,
        toPgVectorLiteral(embedding.values),
      ]
    );
  }

  async search(
    queryEmbedding: Embedding,
    k: number,
    filter?: ChunkFilter
  ): Promise<ScoredChunk[]> {
    this.assertCompatible(queryEmbedding);
    if (k <= 0) return [];

    const scoreExpr =
      this.collection.metric === "cosine"
        ? "1 - (embedding <=> $1::vector)"
        : "(embedding <#> $1::vector) * -1";

    const values: unknown[] = [toPgVectorLiteral(queryEmbedding.values), k];
    let where = "";
    if (filter?.documentIds) {
      values.push([...filter.documentIds]);
      where = "WHERE document_id = ANY($3::text[])";
    }

    const result = await this.pool.query(
      `
      SELECT id, document_id, ordinal, content, token_count, ${scoreExpr} AS score
      FROM ${this.chunksTable}
      ${where}
      ORDER BY score DESC, id ASC
      LIMIT $2
      `,
      values
    );

    return result.rows.map((row) => {
      const r = ScoredChunkRowSchema.parse(row);
      return {
        chunk: {
          id: r.id,
          documentId: r.document_id,
          ordinal: r.ordinal,
          text: r.content,
          tokenCount: r.token_count,
        },
        score: r.score,
      };
    });
  }

  async delete(documentId: string): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM ${this.documentsTable} WHERE id = $1`, [
      documentId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  private assertCompatible(embedding: Embedding): void {
    if (embedding.values.length !== this.collection.dimension) {
      throw new DimensionMismatch(this.collection.dimension, embedding.values.length, {
        collection: this.collection.name,
      });
    }
    if (embedding.model !== this.collection.model) {
      throw new ModelVersionMismatch(
        `Embedding from model "${embedding.model}" cannot be stored in or compared with collection "${this.collection.name}" built with "${this.collection.model}"`,
        { collection: this.collection.name }
      );
    }
  }
}
