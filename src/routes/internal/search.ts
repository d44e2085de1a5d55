import { createSearchController } from "@interfaces/http/SearchController";
import { asyncHandler } from "@middleware/asyncHandler";
import { Router } from "express";

import type { Container } from "@app/container";

/**
 * POST /api/internal/search { query, limit?, documentFilter? } -> { query, results }
 */
export function searchRouter(container: Container): Router {
  const router = Router();
  router.post(
    "/",
    asyncHandler(createSearchController(container.orchestrator, container.config.rag.topK))
  );
  return router;
}
