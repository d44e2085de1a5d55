/**
 * Chat HTTP controllers.
 *
 * POST /api/chat answers in one JSON body. POST /api/chat/stream answers as
 * server-sent events: `token` per fragment, then `done` with the same payload
 * as /api/chat, or `error`. A client that disconnects cancels its query.
 */
import { ChatRequestSchema, ChatResponseSchema } from "@interfaces/http/chat/schema";
import { toAppError, toErrorBody } from "@middleware/errorHandler";

import type { RagOrchestrator } from "@domain/rag/orchestrator";
import type { LoggerPort } from "@infrastructure/logging/Logger";

export interface ChatHttpRequest {
  readonly body: unknown;
}

/** The part of an express Response the chat controllers use. */
export interface ChatHttpResponse {
  readonly writableEnded: boolean;
  on(event: "close", listener: () => void): unknown;
  status(code: number): unknown;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): unknown;
  end(): unknown;
  json(body: unknown): unknown;
}

export interface ChatControllers {
  chat(req: ChatHttpRequest, res: ChatHttpResponse): Promise<void>;
  chatStream(req: ChatHttpRequest, res: ChatHttpResponse): Promise<void>;
}

export function createChatControllers(
  orchestrator: RagOrchestrator,
  logger: LoggerPort
): ChatControllers {
  return {
    async chat(req, res) {
      const body = ChatRequestSchema.parse(req.body);
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      const result = await orchestrator.ask(body, { signal: controller.signal });
      res.json(ChatResponseSchema.parse(result));
    },

    async chatStream(req, res) {
      const body = ChatRequestSchema.parse(req.body);
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      res.status(200);
      res.setHeader("Content-Type", "text/event-stream");
      res.setHeader("Cache-Control", "no-cache");
      res.setHeader("Connection", "keep-alive");
      res.flushHeaders();

      const send = (event: string, data: unknown): void => {
        res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
      };

      try {
        const result = await orchestrator.ask(body, {
          signal: controller.signal,
          onToken: (fragment) => send("token", { text: fragment }),
        });
        send("done", ChatResponseSchema.parse(result));
      } catch (err: unknown) {
        const appError = toAppError(err);
        logger.log(controller.signal.aborted ? "info" : "error", "CHAT_STREAM_FAILED", {
          sessionId: body.sessionId,
          code: appError.type,
          message: appError.message,
        });
        if (!controller.signal.aborted) {
          send("error", toErrorBody(appError).error);
        }
      } finally {
        res.end();
      }
    },
  };
}
