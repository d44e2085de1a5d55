import { z } from "zod";

/**
 * DTOs for the document endpoints. An ingest request names either a file on
 * the server or carries the text inline.
 */
export const IngestFileRequestSchema = z.object({
  filepath: z.string().min(1),
  title: z.string().min(1).optional(),
});

export const IngestTextRequestSchema = z.object({
  sourceRef: z.string().min(1),
  text: z.string().min(1),
  title: z.string().min(1).optional(),
  format: z.enum(["markdown", "text"]).default("text"),
});

export const IngestRequestSchema = z.union([IngestFileRequestSchema, IngestTextRequestSchema]);

export const IngestResponseSchema = z.object({
  status: z.literal("ok"),
  documentId: z.string(),
  sourceRef: z.string(),
  totalChunks: z.number().int().positive(),
  supersededDocumentId: z.string().nullable(),
});

export const DocumentParamsSchema = z.object({
  documentId: z.string().min(1),
});
