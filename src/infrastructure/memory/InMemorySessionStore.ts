import { selectEvictions } from "@domain/session/model";

import type { ConversationTurn, SessionLimits } from "@domain/session/model";
import type { SessionStore } from "@domain/session/ports";

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();

  async listTurns(sessionId: string): Promise<ConversationTurn[]> {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  async appendTurn(turn: ConversationTurn, limits: SessionLimits): Promise<string[]> {
    const turns = [...(this.sessions.get(turn.sessionId) ?? []), turn];
    const evicted = new Set(selectEvictions(turns, limits));
    this.sessions.set(
      turn.sessionId,
      turns.filter((t) => !evicted.has(t.id))
    );
    return [...evicted];
  }

  async deleteSession(sessionId: string): Promise<number> {
    const count = this.sessions.get(sessionId)?.length ?? 0;
    this.sessions.delete(sessionId);
    return count;
  }
}
