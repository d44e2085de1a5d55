import { createHealthController } from "@interfaces/http/HealthController";
import { asyncHandler } from "@middleware/asyncHandler";
import { Router } from "express";

import type { Container } from "@app/container";

export function healthRouter(container: Container): Router {
  const router = Router();
  router.get("/", asyncHandler(createHealthController(container)));
  return router;
}
