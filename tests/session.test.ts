import { describe, it, expect } from "vitest";

import { selectEvictions } from "@domain/session/model";
import { SessionManager } from "@domain/session/sessionManager";
import { PostgresSessionStore } from "@infrastructure/database/PostgresSessionStore";
import { InMemorySessionStore } from "@infrastructure/memory/InMemorySessionStore";

import { createRecordingLogger } from "./helpers/fakes";
import { FakePool } from "./helpers/pg";

import type { ConversationTurn } from "@domain/session/model";

function turn(id: string, tokenCount = 10, sessionId = "s1"): ConversationTurn {
  return {
    id,
    sessionId,
    query: `question ${id}`,
    retrievedChunkIds: ["d1:000000", "d1:000001"],
    citedChunkIds: ["d1:000000"],
    context: "[1] (chunk d1:000000)\ntext",
    answer: `answer ${id}`,
    tokenCount,
    createdAt: new Date("2024-05-01T10:00:00.000Z"),
  };
}

describe("selectEvictions", () => {
  it("keeps at most maxTurns, dropping the oldest", () => {
    const turns = ["t1", "t2", "t3", "t4", "t5", "t6", "t7"].map((id) => turn(id, 1));

    expect(selectEvictions(turns, { maxTurns: 5, maxTokens: 1000 })).toEqual(["t1", "t2"]);
  });

  it("drops older turns once the token ceiling is passed", () => {
    const turns = [turn("t1", 50), turn("t2", 50), turn("t3", 50)];

    expect(selectEvictions(turns, { maxTurns: 10, maxTokens: 120 })).toEqual(["t1"]);
  });

  it("never evicts the newest turn", () => {
    expect(selectEvictions([turn("t1", 500)], { maxTurns: 5, maxTokens: 100 })).toEqual([]);
    expect(
      selectEvictions([turn("t1", 10), turn("t2", 500)], { maxTurns: 5, maxTokens: 100 })
    ).toEqual(["t1"]);
  });
});

describe("SessionManager", () => {
  function manager() {
    const { logger, events } = createRecordingLogger();
    const store = new InMemorySessionStore();
    return { events, store, sessions: new SessionManager(store, { maxTurns: 3, maxTokens: 1000 }, logger) };
  }

  it("commits turns and applies the limits", async () => {
    const { sessions, events } = manager();

    for (const id of ["t1", "t2", "t3", "t4"]) {
      await sessions.commit(turn(id));
    }

    const history = await sessions.history("s1");
    expect(history.map((t) => t.id)).toEqual(["t2", "t3", "t4"]);
    expect(events.at(-1)).toEqual({
      type: "SESSION_TURN_COMMITTED",
      payload: { sessionId: "s1", turnId: "t4", evicted: 1 },
    });
  });

  it("keeps sessions apart", async () => {
    const { sessions } = manager();

    await sessions.commit(turn("a1", 10, "a"));
    await sessions.commit(turn("b1", 10, "b"));

    expect((await sessions.history("a")).map((t) => t.id)).toEqual(["a1"]);
    expect((await sessions.history("b")).map((t) => t.id)).toEqual(["b1"]);
  });

  it("returns the newest turns that fit a token ceiling", async () => {
    const { sessions } = manager();
    await sessions.commit(turn("t1", 30));
    await sessions.commit(turn("t2", 40));
    await sessions.commit(turn("t3", 50));

    const recent = await sessions.recentHistory("s1", 100);

    expect(recent.map((t) => t.id)).toEqual(["t2", "t3"]);
    expect(await sessions.recentHistory("s1", 10)).toEqual([]);
  });

  it("serializes concurrent commits to one session", async () => {
    const { sessions } = manager();

    await Promise.all(["t1", "t2", "t3", "t4", "t5"].map((id) => sessions.commit(turn(id))));

    expect((await sessions.history("s1")).map((t) => t.id)).toEqual(["t3", "t4", "t5"]);
  });

  it("clears a session and reports how many turns went", async () => {
    const { sessions } = manager();
    await sessions.commit(turn("t1"));
    await sessions.commit(turn("t2"));

    expect(await sessions.clear("s1")).toBe(2);
    expect(await sessions.history("s1")).toEqual([]);
    expect(await sessions.clear("s1")).toBe(0);
  });
});

describe("PostgresSessionStore", () => {
  it("refuses table prefixes that are not plain identifiers", () => {
    expect(() => new PostgresSessionStore(new FakePool(), "javis-x")).toThrow(TypeError);
  });

  it("creates its schema once", async () => {
    const pool = new FakePool();
    const store = new PostgresSessionStore(pool, "javis");

    await store.listTurns("s1");
    await store.listTurns("s1");

    const creates = pool.statements.filter((s) =>
      s.startsWith("CREATE TABLE IF NOT EXISTS javis_conversation_turns")
    );
    expect(creates).toHaveLength(1);
    expect(pool.statements.filter((s) => s.startsWith("SELECT"))).toHaveLength(2);
  });

  it("appends and trims in one transaction", async () => {
    const pool = new FakePool((text) => (text.includes("RETURNING id") ? [{ id: "t0" }] : []));
    const store = new PostgresSessionStore(pool, "javis");
    const newest = turn("t9");

    const evicted = await store.appendTurn(newest, { maxTurns: 5, maxTokens: 1000 });

    expect(evicted).toEqual(["t0"]);
    const statements = pool.statements.slice(2);
    expect(statements[0]).toBe("BEGIN");
    expect(statements[1]).toContain("INSERT INTO javis_conversation_turns");
    expect(statements[2]).toContain("WHERE rank > $2 OR (rank > 1 AND running > $3)");
    expect(statements[3]).toBe("COMMIT");
    expect(pool.queries[3]?.values).toEqual([
      "t9",
      "s1",
      "question t9",
      '["d1:000000","d1:000001"]',
      '["d1:000000"]',
      "[1] (chunk d1:000000)\ntext",
      "answer t9",
      10,
      newest.createdAt,
    ]);
    expect(pool.queries[4]?.values).toEqual(["s1", 5, 1000]);
    expect(pool.released).toBe(1);
  });

  it("maps stored rows back to turns in order", async () => {
    const pool = new FakePool((text) =>
      text.includes("SELECT id, session_id")
        ? [
            {
              id: "t1",
              session_id: "s1",
              query: "q",
              retrieved_chunk_ids: ["d1:000000"],
              cited_chunk_ids: [],
              context: "",
              answer: "a",
              token_count: 3,
              created_at: "2024-05-01T10:00:00.000Z",
            },
          ]
        : []
    );
    const store = new PostgresSessionStore(pool, "javis");

    expect(await store.listTurns("s1")).toEqual([
      {
        id: "t1",
        sessionId: "s1",
        query: "q",
        retrievedChunkIds: ["d1:000000"],
        citedChunkIds: [],
        context: "",
        answer: "a",
        tokenCount: 3,
        createdAt: new Date("2024-05-01T10:00:00.000Z"),
      },
    ]);
    expect(pool.statements.at(-1)).toContain("ORDER BY seq ASC");
  });

  it("reports how many rows a clear removed", async () => {
    const pool = new FakePool((text) =>
      text.startsWith("DELETE FROM javis_conversation_turns WHERE session_id")
        ? [{ id: "t1" }, { id: "t2" }]
        : []
    );
    const store = new PostgresSessionStore(pool, "javis");

    expect(await store.deleteSession("s1")).toBe(2);
    expect(pool.queries.at(-1)?.values).toEqual(["s1"]);
  });
});
