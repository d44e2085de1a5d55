/**
 * Packs retrieved chunks into the prompt's context window.
 */
import { compareScoredChunks } from "@domain/rag/model";

import type { Chunk, ScoredChunk } from "@domain/rag/model";

/**
 * Greedy selection in descending score order (ties by chunk id). Stops at the
 * first chunk that would push the running token total past the budget, so a
 * chunk is either included whole or not at all.
 */
export function assemble(retrieved: readonly ScoredChunk[], tokenBudget: number): Chunk[] {
  if (tokenBudget <= 0) {
    return [];
  }

  const ordered = [...retrieved].sort(compareScoredChunks);
  const selected: Chunk[] = [];
  let used = 0;

  for (const { chunk } of ordered) {
    if (used + chunk.tokenCount > tokenBudget) {
      break;
    }
    used += chunk.tokenCount;
    selected.push(chunk);
  }

  return selected;
}

export function renderContext(chunks: readonly Chunk[]): string {
  if (!chunks.length) {
    return "";
  }

  return chunks
    .map((chunk, index) => `[${index + 1}] (chunk ${chunk.id})\n${chunk.text}`)
    .join("\n---\n");
}
