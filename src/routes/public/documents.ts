import { createDocumentControllers } from "@interfaces/http/IngestController";
import { asyncHandler } from "@middleware/asyncHandler";
import { Router } from "express";

import type { Container } from "@app/container";

export function documentsRouter(container: Container): Router {
  const router = Router();
  const controllers = createDocumentControllers(container.ingest);

  router.post("/ingest", asyncHandler(controllers.ingest));
  router.get("/", asyncHandler(controllers.list));
  router.delete("/:documentId", asyncHandler(controllers.remove));

  return router;
}
