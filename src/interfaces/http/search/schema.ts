import { z } from "zod";

export const SearchRequestSchema = z.object({
  query: z.string().min(1),
  limit: z.coerce.number().int().positive().max(100).optional(),
  documentFilter: z.array(z.string().min(1)).min(1).optional(),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  results: z.array(
    z.object({
      chunkId: z.string(),
      documentId: z.string(),
      content: z.string(),
      score: z.number(),
    })
  ),
});
