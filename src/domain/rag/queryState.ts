/**
 * Lifecycle of a single query. States carry what the step produced so far;
 * ERRORED remembers where the query failed.
 */
import { DomainError } from "@typesLocal/AppError";

import type { Chunk, Embedding, ScoredChunk } from "@domain/rag/model";
import type { AppError } from "@typesLocal/AppError";

export type QueryState =
  | { status: "RECEIVED"; queryText: string }
  | { status: "EMBEDDING"; query: string }
  | { status: "RETRIEVING"; query: string; embedding: Embedding }
  | { status: "ASSEMBLING"; query: string; retrieved: ScoredChunk[] }
  | { status: "GENERATING"; prompt: string; cited: Chunk[] }
  | { status: "COMPLETED"; answerText: string }
  | { status: "ERRORED"; failedIn: QueryStatus; error: AppError };

export type QueryStatus = QueryState["status"];

const TRANSITIONS: Record<QueryStatus, readonly QueryStatus[]> = {
  RECEIVED: ["EMBEDDING", "ERRORED"],
  EMBEDDING: ["RETRIEVING", "ERRORED"],
  RETRIEVING: ["ASSEMBLING", "ERRORED"],
  ASSEMBLING: ["GENERATING", "ERRORED"],
  GENERATING: ["COMPLETED", "ERRORED"],
  COMPLETED: [],
  ERRORED: [],
};

export function canTransition(from: QueryStatus, to: QueryStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: QueryStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export class QueryStateMachine {
  private state: QueryState;

  constructor(
    initial: QueryState,
    private readonly onChange?: (state: QueryState) => void
  ) {
    this.state = initial;
    this.onChange?.(initial);
  }

  get current(): QueryState {
    return this.state;
  }

  transition(next: QueryState): void {
    if (!canTransition(this.state.status, next.status)) {
      throw new DomainError(
        `Illegal query state transition ${this.state.status} -> ${next.status}`,
        { from: this.state.status, to: next.status }
      );
    }
    this.state = next;
    this.onChange?.(next);
  }

  /** Moves to ERRORED unless the query already finished. */
  fail(error: AppError): void {
    if (isTerminal(this.state.status)) {
      return;
    }
    this.transition({ status: "ERRORED", failedIn: this.state.status, error });
  }
}
