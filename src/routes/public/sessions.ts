import { createSessionControllers } from "@interfaces/http/SessionController";
import { asyncHandler } from "@middleware/asyncHandler";
import { Router } from "express";

import type { Container } from "@app/container";

export function sessionsRouter(container: Container): Router {
  const router = Router();
  const controllers = createSessionControllers(container.sessions);

  router.get("/:sessionId", asyncHandler(controllers.history));
  router.delete("/:sessionId", asyncHandler(controllers.clear));

  return router;
}
