import fs from "fs";
import os from "os";
import path from "path";

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { MAX_FILE_BYTES, chunkText, normalizeMarkdown } from "@app/ingest/IngestUseCase";
import { NotFoundError, ValidationError } from "@typesLocal/AppError";

import { buildEngine } from "./helpers/engine";

describe("chunkText", () => {
  it("packs whole paragraphs up to the token limit", () => {
    const text = "First paragraph here.\r\n\r\nSecond one.\n\n\nThird paragraph text.";

    expect(chunkText(text, 10)).toEqual([
      "First paragraph here.\n\nSecond one.",
      "Third paragraph text.",
    ]);
  });

  it("splits oversized paragraphs on sentence boundaries", () => {
    expect(chunkText("One two three. Four five six. Seven.", 5)).toEqual([
      "One two three.",
      "Four five six.",
      "Seven.",
    ]);
  });

  it("cuts sentences that are still too long by length", () => {
    expect(chunkText("abcdefghijklmnopqrst", 2)).toEqual(["abcdefgh", "ijklmnop", "qrst"]);
  });

  it("returns nothing for blank text", () => {
    expect(chunkText(" \n\n \n", 10)).toEqual([]);
  });
});

describe("normalizeMarkdown", () => {
  it("keeps the text of headings, paragraphs and code", () => {
    const raw = "# Title\n\nSome **bold** text with a [link](http://example.test).\n\n```\ncode here\n```\n";

    expect(normalizeMarkdown(raw)).toBe("Title\n\nSome bold text with a link.\n\ncode here");
  });
});

describe("IngestService", () => {
  it("supersedes the previous version of a source", async () => {
    const engine = buildEngine();

    const first = await engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Old text." });
    const second = await engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "New text." });

    expect(first).toEqual({
      documentId: "doc-1",
      sourceRef: "notes/a.txt",
      totalChunks: 1,
      supersededDocumentId: null,
    });
    expect(second.supersededDocumentId).toBe("doc-1");
    expect((await engine.ingest.listDocuments()).map((d) => d.id)).toEqual(["doc-2"]);
    expect(engine.vectorStore.size).toBe(1);
  });

  it("leaves one version when the same source is re-ingested concurrently", async () => {
    const engine = buildEngine();
    await engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Old text." });

    const results = await Promise.all([
      engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Second text." }),
      engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Third text." }),
    ]);

    const documents = await engine.ingest.listDocuments();
    expect(documents).toHaveLength(1);
    expect(engine.vectorStore.size).toBe(1);
    expect(results.map((r) => r.supersededDocumentId).sort()).toEqual(
      ["doc-1", ...results.map((r) => r.documentId)]
        .filter((id) => id !== documents[0]?.id)
        .sort()
    );
  });

  it("reuses cached chunk embeddings on re-ingestion", async () => {
    const engine = buildEngine();

    await engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Same text." });
    await engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Same text." });

    expect(engine.embedder.calls).toEqual([{ texts: ["Same text."], kind: "document" }]);
    const successes = engine.events.filter((e) => e.type === "INGEST_SUCCESS");
    expect(successes.map((e) => e.payload.embeddedFresh)).toEqual([1, 0]);
  });

  it("rejects documents without text", async () => {
    const engine = buildEngine();

    await expect(
      engine.ingest.ingestText({ sourceRef: "empty.txt", text: "  \n " })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      engine.ingest.ingestText({ sourceRef: "empty.md", text: "---\n", format: "markdown" })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(engine.ingest.ingestText({ sourceRef: " ", text: "text" })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("keeps the previous version when embedding fails", async () => {
    const engine = buildEngine();
    await engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Old text." });
    vi.spyOn(engine.embedder, "embedBatch").mockRejectedValueOnce(new Error("embedder down"));

    await expect(
      engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "New text." })
    ).rejects.toThrow("embedder down");

    expect((await engine.ingest.listDocuments()).map((d) => d.id)).toEqual(["doc-1"]);
    expect(engine.events.at(-1)?.type).toBe("INGEST_FAILURE");
  });

  it("removes a partially stored version and skips its cache writes", async () => {
    const engine = buildEngine();
    await engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "Old text." });
    vi.spyOn(engine.vectorStore, "upsert").mockRejectedValueOnce(new Error("disk full"));

    await expect(
      engine.ingest.ingestText({ sourceRef: "notes/a.txt", text: "New text." })
    ).rejects.toThrow("disk full");

    expect((await engine.ingest.listDocuments()).map((d) => d.id)).toEqual(["doc-1"]);
    expect(engine.vectorStore.size).toBe(1);
    expect(engine.cache.snapshot().writes).toBe(1);
  });

  it("deletes documents by id", async () => {
    const engine = buildEngine();
    const { documentId } = await engine.ingest.ingestText({ sourceRef: "a.txt", text: "Text." });

    await engine.ingest.deleteDocument(documentId);

    expect(await engine.ingest.listDocuments()).toEqual([]);
    expect(engine.vectorStore.size).toBe(0);
    expect(engine.events.at(-1)).toEqual({ type: "DOCUMENT_DELETED", payload: { documentId } });
    await expect(engine.ingest.deleteDocument(documentId)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("IngestService.ingestFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ingest-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads markdown files and keys them by absolute path", async () => {
    const engine = buildEngine();
    const file = path.join(dir, "guide.md");
    fs.writeFileSync(file, "# Guide\n\nUse **care**.\n");

    const result = await engine.ingest.ingestFile({ filepath: file });

    expect(result.sourceRef).toBe(path.resolve(file));
    expect(result.totalChunks).toBe(1);
    const [summary] = await engine.ingest.listDocuments();
    expect(summary?.title).toBe("guide.md");
    const doc = await engine.vectorStore.findDocumentBySource(result.sourceRef);
    expect(doc?.text).toBe("Guide\n\nUse care.");
  });

  it("rejects missing files, directories and oversized files", async () => {
    const engine = buildEngine();
    const big = path.join(dir, "big.txt");
    fs.writeFileSync(big, Buffer.alloc(MAX_FILE_BYTES + 1, "a"));

    await expect(
      engine.ingest.ingestFile({ filepath: path.join(dir, "missing.md") })
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(engine.ingest.ingestFile({ filepath: dir })).rejects.toBeInstanceOf(ValidationError);
    await expect(engine.ingest.ingestFile({ filepath: big })).rejects.toThrow("File too large (max 5MB)");
  });
});
