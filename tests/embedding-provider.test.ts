import { describe, it, expect } from "vitest";

import { OpenAIEmbeddingProvider, taskPrefix } from "@infrastructure/llm/EmbeddingProvider";
import { ModelVersionMismatch, ProviderUnavailable, ValidationError } from "@typesLocal/AppError";

import { createRecordingLogger } from "./helpers/fakes";

import type { EmbeddingsClient } from "@infrastructure/llm/EmbeddingProvider";

type CreateBody = Parameters<EmbeddingsClient["embeddings"]["create"]>[0];
type CreateResult = Awaited<ReturnType<EmbeddingsClient["embeddings"]["create"]>>;

function fakeClient(handler: (body: CreateBody, call: number) => CreateResult) {
  const bodies: CreateBody[] = [];
  const client: EmbeddingsClient = {
    embeddings: {
      async create(body) {
        bodies.push(body);
        return handler(body, bodies.length);
      },
    },
  };
  return { client, bodies };
}

function provider(client: EmbeddingsClient, model = "nomic-embed-text", dimension = 3) {
  const { logger, events } = createRecordingLogger();
  return {
    events,
    embedder: new OpenAIEmbeddingProvider({
      client,
      model,
      dimension,
      policy: { maxRetries: 2, baseDelayMs: 1, timeoutMs: 1000 },
      logger,
    }),
  };
}

describe("taskPrefix", () => {
  it("prefixes nomic-embed-text models only", () => {
    expect(taskPrefix("nomic-embed-text", "query")).toBe("search_query: ");
    expect(taskPrefix("nomic-embed-text:v1.5", "document")).toBe("search_document: ");
    expect(taskPrefix("mxbai-embed-large", "query")).toBe("");
  });
});

describe("OpenAIEmbeddingProvider", () => {
  it("normalizes and prefixes the text before embedding it", async () => {
    const { client, bodies } = fakeClient(() => ({ data: [{ embedding: [0.1, 0.2, 0.3], index: 0 }] }));
    const { embedder, events } = provider(client);

    const embedding = await embedder.embed("  Hello \n  world ", "query");

    expect(bodies).toEqual([{ model: "nomic-embed-text", input: "search_query: Hello world" }]);
    expect(embedding).toEqual({ values: [0.1, 0.2, 0.3], model: "nomic-embed-text" });
    expect(events.map((e) => e.type)).toEqual(["EMBEDDING_SUCCESS"]);
  });

  it("sends other models the bare text", async () => {
    const { client, bodies } = fakeClient(() => ({ data: [{ embedding: [1, 0, 0], index: 0 }] }));
    const { embedder } = provider(client, "mxbai-embed-large");

    await embedder.embed("Hello", "document");

    expect(bodies[0]?.input).toBe("Hello");
  });

  it("rejects empty text without calling the backend", async () => {
    const { client, bodies } = fakeClient(() => ({ data: [] }));
    const { embedder } = provider(client);

    await expect(embedder.embed(" \t\n", "query")).rejects.toBeInstanceOf(ValidationError);
    expect(bodies).toHaveLength(0);
  });

  it("treats a vector of the wrong length as a model mismatch", async () => {
    const { client } = fakeClient(() => ({ data: [{ embedding: [1, 2], index: 0 }] }));
    const { embedder } = provider(client);

    await expect(embedder.embed("Hello", "query")).rejects.toBeInstanceOf(ModelVersionMismatch);
  });

  it("retries a busy backend and then succeeds", async () => {
    const { client, bodies } = fakeClient((_body, call) => {
      if (call < 3) throw Object.assign(new Error("busy"), { status: 503 });
      return { data: [{ embedding: [0, 1, 0], index: 0 }] };
    });
    const { embedder } = provider(client);

    const embedding = await embedder.embed("Hello", "query");

    expect(embedding.values).toEqual([0, 1, 0]);
    expect(bodies).toHaveLength(3);
  });

  it("reports an unreachable backend as ProviderUnavailable", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    const { client, bodies } = fakeClient(() => {
      throw refused;
    });
    const { embedder, events } = provider(client);

    const error = await embedder.embed("Hello", "query").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailable);
    expect(error instanceof ProviderUnavailable && error.cause).toBe(refused);
    expect(bodies).toHaveLength(3);
    expect(events.map((e) => e.type)).toEqual(["EMBEDDING_FAILURE"]);
  });

  it("embeds a batch in one request and returns vectors in input order", async () => {
    const { client, bodies } = fakeClient(() => ({
      data: [
        { embedding: [0, 0, 2], index: 1 },
        { embedding: [0, 0, 1], index: 0 },
      ],
    }));
    const { embedder } = provider(client);

    const embeddings = await embedder.embedBatch(["first", "second"], "document");

    expect(bodies).toEqual([
      {
        model: "nomic-embed-text",
        input: ["search_document: first", "search_document: second"],
      },
    ]);
    expect(embeddings.map((e) => e.values)).toEqual([
      [0, 0, 1],
      [0, 0, 2],
    ]);
  });

  it("skips the backend for an empty batch", async () => {
    const { client, bodies } = fakeClient(() => ({ data: [] }));
    const { embedder } = provider(client);

    expect(await embedder.embedBatch([], "document")).toEqual([]);
    expect(bodies).toHaveLength(0);
  });
});
