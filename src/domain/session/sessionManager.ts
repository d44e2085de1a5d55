/**
 * Session ownership for the orchestrator: history reads, serialized turn
 * commits and bounded length.
 */
import { KeyedMutex } from "@utils/mutex";

import type { ConversationTurn, SessionLimits } from "@domain/session/model";
import type { SessionStore } from "@domain/session/ports";
import type { LoggerPort } from "@infrastructure/logging/Logger";

export class SessionManager {
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly store: SessionStore,
    readonly limits: SessionLimits,
    private readonly logger: LoggerPort
  ) {}

  async history(sessionId: string): Promise<ConversationTurn[]> {
    return this.store.listTurns(sessionId);
  }

  /**
   * Most recent turns whose combined token estimate fits the ceiling, oldest
   * first.
   */
  async recentHistory(
    sessionId: string,
    tokenCeiling: number
  ): Promise<ConversationTurn[]> {
    const turns = await this.store.listTurns(sessionId);
    const kept: ConversationTurn[] = [];
    let used = 0;

    for (let i = turns.length - 1; i >= 0; i--) {
      const turn = turns[i];
      if (!turn || used + turn.tokenCount > tokenCeiling) break;
      used += turn.tokenCount;
      kept.unshift(turn);
    }

    return kept;
  }

  async commit(turn: ConversationTurn): Promise<void> {
    const evicted = await this.mutex.runExclusive(turn.sessionId, () =>
      this.store.appendTurn(turn, this.limits)
    );

    this.logger.event("SESSION_TURN_COMMITTED", {
      sessionId: turn.sessionId,
      turnId: turn.id,
      evicted: evicted.length,
    });
  }

  async clear(sessionId: string): Promise<number> {
    return this.mutex.runExclusive(sessionId, () =>
      this.store.deleteSession(sessionId)
    );
  }
}
