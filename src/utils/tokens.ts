/**
 * Token estimation used for chunk sizing, context budgets and session
 * ceilings. Local models ship different tokenizers, so the engine relies on
 * a stable character heuristic (about four characters per token for prose).
 */
const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
