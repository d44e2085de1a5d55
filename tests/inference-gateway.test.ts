import { describe, it, expect } from "vitest";

import { InferenceGateway } from "@infrastructure/llm/InferenceGateway";
import { AttemptTimeoutError } from "@infrastructure/llm/retry";
import { GenerationFailed, QueryCancelled } from "@typesLocal/AppError";

import { ScriptedChatClient, abortError, createRecordingLogger } from "./helpers/fakes";

import type { ChatCompletionClient } from "@domain/llm/ports";

function gateway(client: ChatCompletionClient, maxRetries = 2, timeoutMs = 1000) {
  const { logger, logs, events } = createRecordingLogger();
  return {
    logs,
    events,
    gateway: new InferenceGateway({
      client,
      model: "test-llm",
      systemPrompt: "Be brief.",
      policy: { maxRetries, baseDelayMs: 1, timeoutMs },
      logger,
      defaults: { maxTokens: 128, temperature: 0.2, stopSequences: ["END"] },
    }),
  };
}

function busy(): Error {
  return Object.assign(new Error("model busy"), { status: 503 });
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of iterable) fragments.push(fragment);
  return fragments;
}

describe("InferenceGateway.generate", () => {
  it("sends system instructions and the prompt with merged options", async () => {
    const chat = new ScriptedChatClient([{ text: "Hi.", finishReason: "length" }]);
    const { gateway: g } = gateway(chat);

    const result = await g.generate("Say hi", { maxTokens: 16 });

    expect(result).toEqual({ text: "Hi.", model: "test-llm", finishReason: "length", attempts: 1 });
    expect(chat.requests[0]).toEqual({
      model: "test-llm",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Say hi" },
      ],
      maxTokens: 16,
      temperature: 0.2,
      stop: ["END"],
    });
  });

  it("retries transient failures", async () => {
    const chat = new ScriptedChatClient([{ error: busy() }, { text: "fine" }]);
    const { gateway: g, logs } = gateway(chat);

    const result = await g.generate("prompt");

    expect(result.text).toBe("fine");
    expect(result.attempts).toBe(2);
    expect(logs.filter((l) => l.message === "LLM_RETRY")).toHaveLength(1);
  });

  it("fails immediately on a non-transient error", async () => {
    const invalid = Object.assign(new Error("bad request"), { status: 400 });
    const chat = new ScriptedChatClient([{ error: invalid }]);
    const { gateway: g } = gateway(chat);

    const error = await g.generate("prompt").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailed);
    expect(error instanceof GenerationFailed && error.cause).toBe(invalid);
    expect(chat.requests).toHaveLength(1);
  });

  it("gives up after maxRetries timeouts", async () => {
    const chat = new ScriptedChatClient([{ hang: true }, { hang: true }]);
    const { gateway: g, events } = gateway(chat, 1, 15);

    const error = await g.generate("prompt").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailed);
    expect(error instanceof GenerationFailed && error.metadata?.attempts).toBe(2);
    expect(error instanceof GenerationFailed && error.cause).toBeInstanceOf(AttemptTimeoutError);
    expect(chat.signals.every((s) => s.aborted)).toBe(true);
    expect(events.map((e) => e.type)).toEqual(["LLM_FAILURE"]);
  });

  it("passes caller cancellation through as QueryCancelled", async () => {
    const chat = new ScriptedChatClient([{ hang: true }]);
    const { gateway: g } = gateway(chat);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(g.generate("prompt", {}, controller.signal)).rejects.toBeInstanceOf(QueryCancelled);
    expect(chat.requests).toHaveLength(1);
  });
});

describe("InferenceGateway.stream", () => {
  it("yields fragments lazily", async () => {
    const chat = new ScriptedChatClient([{ text: "one two three" }]);
    const { gateway: g } = gateway(chat);

    expect(await collect(g.stream("prompt"))).toEqual(["one ", "two ", "three"]);
  });

  it("retries before the first fragment", async () => {
    const chat = new ScriptedChatClient([{ error: busy() }, { text: "a b" }]);
    const { gateway: g } = gateway(chat);

    expect(await collect(g.stream("prompt"))).toEqual(["a ", "b"]);
    expect(chat.requests).toHaveLength(2);
  });

  it("does not retry once a fragment has been delivered", async () => {
    let opened = 0;
    const client: ChatCompletionClient = {
      async complete() {
        return { text: "", finishReason: "stop" };
      },
      async *stream() {
        opened += 1;
        yield "partial ";
        throw busy();
      },
    };
    const { gateway: g } = gateway(client);
    const fragments: string[] = [];

    const error = await (async () => {
      for await (const fragment of g.stream("prompt")) fragments.push(fragment);
    })().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailed);
    expect(fragments).toEqual(["partial "]);
    expect(opened).toBe(1);
  });

  it("bounds the wait for each fragment", async () => {
    let upstream: AbortSignal | undefined;
    const client: ChatCompletionClient = {
      async complete() {
        return { text: "", finishReason: "stop" };
      },
      async *stream(_request, signal) {
        upstream = signal;
        yield "first ";
        await new Promise((_, reject) => {
          signal.addEventListener("abort", () => reject(abortError()), { once: true });
        });
      },
    };
    const { gateway: g } = gateway(client, 2, 20);

    const error = await collect(g.stream("prompt")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailed);
    expect(error instanceof GenerationFailed && error.cause).toBeInstanceOf(AttemptTimeoutError);
    expect(upstream?.aborted).toBe(true);
  });

  it("aborts the upstream request when the consumer stops early", async () => {
    let upstream: AbortSignal | undefined;
    let closed = false;
    const client: ChatCompletionClient = {
      async complete() {
        return { text: "", finishReason: "stop" };
      },
      async *stream(_request, signal) {
        upstream = signal;
        try {
          for (let i = 0; ; i++) yield `t${i} `;
        } finally {
          closed = true;
        }
      },
    };
    const { gateway: g } = gateway(client);
    const fragments: string[] = [];

    for await (const fragment of g.stream("prompt")) {
      fragments.push(fragment);
      if (fragments.length === 2) break;
    }

    expect(fragments).toEqual(["t0 ", "t1 "]);
    expect(upstream?.aborted).toBe(true);
    expect(closed).toBe(true);
  });

  it("surfaces caller cancellation as QueryCancelled", async () => {
    const chat = new ScriptedChatClient([{ hang: true }]);
    const { gateway: g } = gateway(chat);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(collect(g.stream("prompt", {}, controller.signal))).rejects.toBeInstanceOf(
      QueryCancelled
    );
    expect(chat.requests).toHaveLength(1);
  });
});
