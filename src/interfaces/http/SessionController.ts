import { SessionParamsSchema } from "@interfaces/http/sessions/schema";

import type { SessionManager } from "@domain/session/sessionManager";
import type { Request, Response } from "express";

export function createSessionControllers(sessions: SessionManager) {
  return {
    async history(req: Request, res: Response): Promise<void> {
      const { sessionId } = SessionParamsSchema.parse(req.params);
      const turns = await sessions.history(sessionId);

      res.json({
        sessionId,
        turns: turns.map((turn) => ({
          id: turn.id,
          query: turn.query,
          answer: turn.answer,
          citedChunkIds: turn.citedChunkIds,
          retrievedChunkIds: turn.retrievedChunkIds,
          tokenCount: turn.tokenCount,
          createdAt: turn.createdAt.toISOString(),
        })),
      });
    },

    async clear(req: Request, res: Response): Promise<void> {
      const { sessionId } = SessionParamsSchema.parse(req.params);
      const deleted = await sessions.clear(sessionId);
      res.json({ sessionId, deleted });
    },
  };
}
