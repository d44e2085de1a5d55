/**
 * Core records of the knowledge base.
 */
export interface Document {
  id: string;
  /** Where the text came from (file path, URL, caller-chosen key). */
  sourceRef: string;
  title: string | null;
  text: string;
  ingestedAt: Date;
}

/** A document without its text, for listings. */
export type DocumentSummary = Omit<Document, "text">;

export interface Chunk {
  /** `<documentId>:<ordinal padded to 6 digits>` */
  id: string;
  documentId: string;
  ordinal: number;
  text: string;
  tokenCount: number;
}

export type EmbeddingKind = "query" | "document";

export interface Embedding {
  values: number[];
  /** Model that produced the vector; vectors of different models never mix. */
  model: string;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export interface ChunkFilter {
  /** Only chunks belonging to these documents are eligible. */
  documentIds?: readonly string[];
}

const ORDINAL_WIDTH = 6;

export function chunkId(documentId: string, ordinal: number): string {
  return `${documentId}:${String(ordinal).padStart(ORDINAL_WIDTH, "0")}`;
}

/** Descending score, then ascending chunk id. */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.chunk.id < b.chunk.id) return -1;
  if (a.chunk.id > b.chunk.id) return 1;
  return 0;
}
