import { z } from "zod";

/**
 * Request/response DTOs for POST /api/chat and POST /api/chat/stream.
 */
export const ChatRequestSchema = z.object({
  sessionId: z.string().trim().min(1).max(200),
  queryText: z.string().min(1).max(20000),
  documentFilter: z.array(z.string().min(1)).min(1).optional(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export const LatencyBreakdownSchema = z.object({
  embeddingMs: z.number(),
  retrievalMs: z.number(),
  assemblyMs: z.number(),
  generationMs: z.number(),
  commitMs: z.number(),
  totalMs: z.number(),
  embeddingCacheHit: z.boolean(),
  generationCacheHit: z.boolean(),
});

export const ChatResponseSchema = z.object({
  turnId: z.string(),
  answerText: z.string(),
  citedChunkIds: z.array(z.string()),
  retrievedChunkIds: z.array(z.string()),
  latencyBreakdown: LatencyBreakdownSchema,
});

export type ChatResponse = z.infer<typeof ChatResponseSchema>;
