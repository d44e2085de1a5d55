import { errorMessage } from "@typesLocal/AppError";

import type { Container } from "@app/container";
import type { Request, Response } from "express";

/**
 * Reports model server reachability, the cache backend and whether the
 * engine has latched a fatal configuration error.
 */
export function createHealthController(container: Container) {
  return async function healthController(_req: Request, res: Response): Promise<void> {
    const fatal = container.orchestrator.fatal;
    let llm: { status: "connected"; models: string[] } | { status: "disconnected"; detail: string };

    try {
      llm = { status: "connected", models: await container.chatClient.ping() };
    } catch (error: unknown) {
      llm = { status: "disconnected", detail: errorMessage(error) };
    }

    const ok = !fatal && llm.status === "connected";

    res.status(ok ? 200 : 503).json({
      status: ok ? "ok" : "degraded",
      llm,
      cache: { store: container.cache.storeName, ...container.cache.snapshot() },
      fatal: fatal ? { code: fatal.type, message: fatal.message } : null,
    });
  };
}
