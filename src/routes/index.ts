/**
 * Express route registration.
 *
 * - /api/health: model server reachability and engine status
 * - /api/chat: question answering, JSON or server-sent events
 * - /api/sessions: conversation history
 * - /api/documents: knowledge base ingestion and maintenance
 * - /api/internal/search: raw retrieval for debugging
 */
import { searchRouter } from "@routes/internal/search";
import { chatRouter } from "@routes/public/chat";
import { documentsRouter } from "@routes/public/documents";
import { healthRouter } from "@routes/public/health";
import { sessionsRouter } from "@routes/public/sessions";

import type { Container } from "@app/container";
import type { Express } from "express";

export function registerRoutes(app: Express, container: Container): void {
  app.use("/api/health", healthRouter(container));
  app.use("/api/chat", chatRouter(container));
  app.use("/api/sessions", sessionsRouter(container));
  app.use("/api/documents", documentsRouter(container));
  app.use("/api/internal/search", searchRouter(container));
}
