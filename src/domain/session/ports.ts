import type { ConversationTurn, SessionLimits } from "@domain/session/model";

/**
 * Persistence for conversation turns.
 *
 * appendTurn must add the turn and apply the eviction policy as one atomic
 * step; callers serialize appends per session.
 */
export interface SessionStore {
  /** Turns ordered oldest first. */
  listTurns(sessionId: string): Promise<ConversationTurn[]>;

  /** Returns the ids of evicted turns. */
  appendTurn(turn: ConversationTurn, limits: SessionLimits): Promise<string[]>;

  deleteSession(sessionId: string): Promise<number>;
}
