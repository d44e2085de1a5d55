import { createChatControllers } from "@interfaces/http/ChatController";
import { asyncHandler } from "@middleware/asyncHandler";
import { Router } from "express";

import type { Container } from "@app/container";

export function chatRouter(container: Container): Router {
  const router = Router();
  const controllers = createChatControllers(container.orchestrator, container.logger);

  router.post("/", asyncHandler(controllers.chat));
  router.post("/stream", asyncHandler(controllers.chatStream));

  return router;
}
