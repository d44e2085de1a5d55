export interface ConversationTurn {
  id: string;
  sessionId: string;
  query: string;
  /** Every chunk the search returned for this query. */
  retrievedChunkIds: string[];
  /** Chunks that made it into the prompt. */
  citedChunkIds: string[];
  context: string;
  answer: string;
  /** Estimate for query + answer, the part replayed as history. */
  tokenCount: number;
  createdAt: Date;
}

export interface SessionLimits {
  maxTurns: number;
  maxTokens: number;
}

/**
 * Returns the ids of turns to evict, given turns ordered oldest first.
 *
 * Walking from the newest turn backwards, a turn goes when its rank exceeds
 * maxTurns or when the running token total passes maxTokens. The newest turn
 * always stays.
 */
export function selectEvictions(
  turns: readonly Pick<ConversationTurn, "id" | "tokenCount">[],
  limits: SessionLimits
): string[] {
  const evicted: string[] = [];
  let running = 0;

  for (let i = turns.length - 1, rank = 1; i >= 0; i--, rank++) {
    const turn = turns[i];
    if (!turn) continue;
    running += turn.tokenCount;

    const overCount = rank > limits.maxTurns;
    const overTokens = rank > 1 && running > limits.maxTokens;

    if (overCount || overTokens) {
      evicted.push(turn.id);
    }
  }

  return evicted.reverse();
}
