/**
 * Internal endpoint exposing raw similarity search, for checking retrieval
 * quality without generating an answer.
 */
import { SearchRequestSchema, SearchResponseSchema } from "@interfaces/http/search/schema";

import type { RagOrchestrator } from "@domain/rag/orchestrator";
import type { Request, Response } from "express";

export function createSearchController(orchestrator: RagOrchestrator, defaultLimit: number) {
  return async function searchController(req: Request, res: Response): Promise<void> {
    const { query, limit, documentFilter } = SearchRequestSchema.parse(req.body);

    const results = await orchestrator.search(query, limit ?? defaultLimit, documentFilter);

    res.json(
      SearchResponseSchema.parse({
        query,
        results: results.map(({ chunk, score }) => ({
          chunkId: chunk.id,
          documentId: chunk.documentId,
          content: chunk.text,
          score,
        })),
      })
    );
  };
}
