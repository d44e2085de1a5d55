import { estimateTokens } from "@utils/tokens";

import type { ConversationTurn } from "@domain/session/model";

export const DEFAULT_SYSTEM_PROMPT = `You are Javis, a local assistant that answers from the user's own documents.

RULES:
1. Answer using the DOCUMENT CONTEXT and the conversation so far.
2. When you use a context block, cite it by its number, e.g. [1].
3. If the context does not contain the answer, say that you don't know from the documents.
4. Never invent facts. Be concise.`;

export interface PromptInput {
  context: string;
  history: readonly Pick<ConversationTurn, "query" | "answer">[];
  query: string;
}

export function buildPrompt({ context, history, query }: PromptInput): string {
  const sections = [`DOCUMENT CONTEXT:\n${context || "No documents."}`];

  if (history.length) {
    const lines = history.map((turn) => `User: ${turn.query}\nAssistant: ${turn.answer}`);
    sections.push(`CONVERSATION:\n${lines.join("\n")}`);
  }

  sections.push(`QUESTION:\n${query}`);
  return sections.join("\n\n");
}

/** Tokens the prompt costs before any context is added. */
export function scaffoldingTokens(
  systemPrompt: string,
  history: PromptInput["history"],
  query: string
): number {
  return estimateTokens(systemPrompt) + estimateTokens(buildPrompt({ context: "", history, query }));
}
