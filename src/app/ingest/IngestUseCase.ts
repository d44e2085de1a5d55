/**
 * Document ingestion pipeline.
 *
 * Handles end-to-end processing of Markdown and plain-text documents:
 * - Validates file existence and size constraints
 * - Normalizes markdown content to plain text
 * - Chunks text to a token budget on paragraph and sentence boundaries
 * - Embeds chunks (through the embedding cache)
 * - Stores the document and its chunks, superseding any earlier version
 *   from the same source
 */
import crypto from "crypto";
import fs from "fs";
import path from "path";

import { CacheLayer } from "@domain/cache/cacheLayer";
import { chunkId } from "@domain/rag/model";
import {
  InfrastructureError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from "@typesLocal/AppError";
import { KeyedMutex } from "@utils/mutex";
import { estimateTokens } from "@utils/tokens";
import MarkdownIt from "markdown-it";
import { z } from "zod";

import type { Chunk, Document, DocumentSummary, Embedding } from "@domain/rag/model";
import type { EmbeddingProvider, VectorStore } from "@domain/rag/ports";
import type { LoggerPort } from "@infrastructure/logging/Logger";

const md = new MarkdownIt();

type MarkdownToken = ReturnType<MarkdownIt["parse"]>[number];

export const MAX_FILE_BYTES = 5 * 1024 * 1024;

const CHARS_PER_TOKEN = 4;

export type DocumentFormat = "markdown" | "text";

export interface IngestTextRequest {
  sourceRef: string;
  text: string;
  title?: string;
  format?: DocumentFormat;
}

export interface IngestFileRequest {
  filepath: string;
  title?: string;
}

export interface IngestResult {
  documentId: string;
  sourceRef: string;
  totalChunks: number;
  supersededDocumentId: string | null;
}

export interface IngestServiceDeps {
  embedder: EmbeddingProvider;
  vectorStore: VectorStore;
  cache: CacheLayer;
  logger: LoggerPort;
  chunkTokens: number;
  now?: () => number;
  newId?: () => string;
}

function inlineText(children: MarkdownToken[] | null): string {
  if (!children) return "";
  return children
    .map((child) => {
      switch (child.type) {
        case "text":
        case "code_inline":
          return child.content;
        case "softbreak":
          return " ";
        case "hardbreak":
          return "\n";
        default:
          return "";
      }
    })
    .join("");
}

/** Markdown to plain text, one paragraph per block. */
export function normalizeMarkdown(raw: string): string {
  const blocks: string[] = [];

  for (const token of md.parse(raw, {})) {
    if (token.type === "inline") {
      blocks.push(inlineText(token.children).trim());
    } else if (token.type === "fence" || token.type === "code_block") {
      blocks.push(token.content.trim());
    }
  }

  return blocks.filter(Boolean).join("\n\n");
}

function hardSplit(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  for (let start = 0; start < text.length; start += maxChars) {
    const piece = text.slice(start, start + maxChars).trim();
    if (piece) pieces.push(piece);
  }
  return pieces;
}

function pack(units: string[], separator: string, maxTokens: number): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const unit of units) {
    const candidate = current ? current + separator + unit : unit;
    if (estimateTokens(candidate) <= maxTokens) {
      current = candidate;
      continue;
    }
    if (current) chunks.push(current);
    current = unit;
  }

  if (current) chunks.push(current);
  return chunks;
}

/**
 * Splits text on blank lines and packs paragraphs into chunks of at most
 * maxTokens. Paragraphs that are too large on their own are split on
 * sentence boundaries, and sentences that are still too large are cut by
 * length.
 */
export function chunkText(text: string, maxTokens: number): string[] {
  const maxChars = maxTokens * CHARS_PER_TOKEN;
  const paragraphs = text
    .replace(/\r\n?/g, "\n")
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter(Boolean);

  const units: string[] = [];
  for (const paragraph of paragraphs) {
    if (estimateTokens(paragraph) <= maxTokens) {
      units.push(paragraph);
      continue;
    }

    const sentences = paragraph
      .split(/(?<=[.!?])\s+/)
      .flatMap((s) => (estimateTokens(s) <= maxTokens ? [s] : hardSplit(s, maxChars)));
    units.push(...pack(sentences, " ", maxTokens));
  }

  return pack(units, "\n\n", maxTokens);
}

function formatFor(filepath: string): DocumentFormat {
  const ext = path.extname(filepath).toLowerCase();
  return ext === ".md" || ext === ".markdown" ? "markdown" : "text";
}

const EmbeddingValuesSchema = z.array(z.number());

export class IngestService {
  private readonly now: () => number;
  private readonly newId: () => string;
  /** Supersede steps for one source run one at a time. */
  private readonly sources = new KeyedMutex();

  constructor(private readonly deps: IngestServiceDeps) {
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? (() => crypto.randomUUID());
  }

  async ingestFile(input: IngestFileRequest): Promise<IngestResult> {
    const { filepath, title } = input;

    if (!filepath) {
      throw new ValidationError("filepath required");
    }

    if (!fs.existsSync(filepath)) {
      throw new NotFoundError("file not found", { filepath });
    }

    const fileStats = fs.statSync(filepath);
    if (!fileStats.isFile()) {
      throw new ValidationError("filepath is not a file", { filepath });
    }
    if (fileStats.size > MAX_FILE_BYTES) {
      throw new ValidationError("File too large (max 5MB)", {
        filepath,
        size: fileStats.size,
      });
    }

    const raw = fs.readFileSync(filepath, "utf-8");

    return this.ingestText({
      sourceRef: path.resolve(filepath),
      text: raw,
      title: title ?? path.basename(filepath),
      format: formatFor(filepath),
    });
  }

  async ingestText(input: IngestTextRequest): Promise<IngestResult> {
    const { cache, logger, chunkTokens } = this.deps;
    const { sourceRef, format = "text" } = input;
    const startedAt = this.now();

    if (!sourceRef.trim()) {
      throw new ValidationError("sourceRef required");
    }
    if (Buffer.byteLength(input.text, "utf-8") > MAX_FILE_BYTES) {
      throw new ValidationError("Document too large (max 5MB)", { sourceRef });
    }

    const plain = format === "markdown" ? normalizeMarkdown(input.text) : input.text.trim();
    const pieces = chunkText(plain, chunkTokens);
    if (pieces.length === 0) {
      throw new ValidationError("Document has no text to index", { sourceRef });
    }

    const document: Document = {
      id: this.newId(),
      sourceRef,
      title: input.title ?? null,
      text: plain,
      ingestedAt: new Date(this.now()),
    };
    const chunks: Chunk[] = pieces.map((text, ordinal) => ({
      id: chunkId(document.id, ordinal),
      documentId: document.id,
      ordinal,
      text,
      tokenCount: estimateTokens(text),
    }));

    try {
      const { embeddings, fresh } = await this.embedChunks(chunks);
      const previous = await this.sources.runExclusive(sourceRef, () =>
        this.replace(document, chunks, embeddings)
      );

      for (const [key, values] of fresh) {
        await cache.set(key, values);
      }

      logger.event("INGEST_SUCCESS", {
        sourceRef,
        documentId: document.id,
        totalChunks: chunks.length,
        embeddedFresh: fresh.size,
        supersededDocumentId: previous?.id ?? null,
        durationMs: this.now() - startedAt,
      });

      return {
        documentId: document.id,
        sourceRef,
        totalChunks: chunks.length,
        supersededDocumentId: previous?.id ?? null,
      };
    } catch (error: unknown) {
      logger.event("INGEST_FAILURE", {
        sourceRef,
        documentId: document.id,
        message: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Stores the new version and then drops the one it supersedes. On failure
   * the partial new version is removed and the previous one stays in place.
   */
  private async replace(
    document: Document,
    chunks: Chunk[],
    embeddings: Embedding[]
  ): Promise<Document | null> {
    const { vectorStore, logger } = this.deps;
    const previous = await vectorStore.findDocumentBySource(document.sourceRef);

    try {
      await vectorStore.upsertDocument(document);
      for (const [i, chunk] of chunks.entries()) {
        const embedding = embeddings[i];
        if (!embedding) {
          throw new InfrastructureError("Missing embedding for chunk", {
            metadata: { chunkId: chunk.id },
          });
        }
        await vectorStore.upsert(chunk, embedding);
      }

      if (previous && previous.id !== document.id) {
        await vectorStore.delete(previous.id);
      }
      return previous;
    } catch (error: unknown) {
      await vectorStore.delete(document.id).catch((cleanupError: unknown) => {
        logger.log("error", "INGEST_CLEANUP_FAILED", {
          documentId: document.id,
          error: errorMessage(cleanupError),
        });
      });
      throw error;
    }
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    return this.deps.vectorStore.listDocuments();
  }

  async deleteDocument(documentId: string): Promise<void> {
    const { vectorStore, logger } = this.deps;

    if (!(await vectorStore.delete(documentId))) {
      throw new NotFoundError("document not found", { documentId });
    }

    logger.event("DOCUMENT_DELETED", { documentId });
  }

  /** Cached vectors are reused; the rest are embedded in one batch. */
  private async embedChunks(
    chunks: Chunk[]
  ): Promise<{ embeddings: Embedding[]; fresh: Map<string, number[]> }> {
    const { embedder, cache } = this.deps;
    const modelTag = `${embedder.model}:document`;

    const keys = chunks.map((chunk) => CacheLayer.key(chunk.text, "embedding", modelTag));
    const found: Array<Embedding | undefined> = [];
    const missing: number[] = [];

    for (const [i, key] of keys.entries()) {
      const cached = await cache.get(key, EmbeddingValuesSchema);
      if (cached && cached.length === embedder.dimension) {
        found[i] = { values: cached, model: embedder.model };
      } else {
        found[i] = undefined;
        missing.push(i);
      }
    }

    const fresh = new Map<string, number[]>();
    if (missing.length > 0) {
      const texts = missing.map((i) => chunks[i]?.text ?? "");
      const embedded = await embedder.embedBatch(texts, "document");

      for (const [j, index] of missing.entries()) {
        const embedding = embedded[j];
        const key = keys[index];
        if (!embedding || key === undefined) continue;
        found[index] = embedding;
        fresh.set(key, embedding.values);
      }
    }

    const embeddings = found.filter((e): e is Embedding => e !== undefined);
    if (embeddings.length !== chunks.length) {
      throw new InfrastructureError("Embedding count does not match chunk count", {
        metadata: { chunks: chunks.length, embeddings: embeddings.length },
      });
    }

    return { embeddings, fresh };
  }
}
