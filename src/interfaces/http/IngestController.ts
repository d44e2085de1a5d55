/**
 * Document HTTP controllers: ingest, list and delete.
 */
import {
  DocumentParamsSchema,
  IngestRequestSchema,
  IngestResponseSchema,
} from "@interfaces/http/ingest/schema";

import type { IngestService } from "@app/ingest/IngestUseCase";
import type { Request, Response } from "express";

export function createDocumentControllers(ingest: IngestService) {
  return {
    async ingest(req: Request, res: Response): Promise<void> {
      const parsed = IngestRequestSchema.parse(req.body);

      const result =
        "filepath" in parsed
          ? await ingest.ingestFile(parsed)
          : await ingest.ingestText(parsed);

      res.status(201).json(IngestResponseSchema.parse({ status: "ok", ...result }));
    },

    async list(_req: Request, res: Response): Promise<void> {
      const documents = await ingest.listDocuments();

      res.json({
        documents: documents.map((d) => ({
          id: d.id,
          sourceRef: d.sourceRef,
          title: d.title,
          ingestedAt: d.ingestedAt.toISOString(),
        })),
      });
    },

    async remove(req: Request, res: Response): Promise<void> {
      const { documentId } = DocumentParamsSchema.parse(req.params);
      await ingest.deleteDocument(documentId);
      res.status(204).end();
    },
  };
}
