/**
 * Postgres-backed SessionStore. Turns are appended and trimmed in one
 * transaction; the window query mirrors selectEvictions().
 */
import { withTransaction } from "@infrastructure/database/db";
import { z } from "zod";

import type { PoolLike } from "@infrastructure/database/db";
import type { ConversationTurn, SessionLimits } from "@domain/session/model";
import type { SessionStore } from "@domain/session/ports";

const TurnRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  query: z.string(),
  retrieved_chunk_ids: z.array(z.string()),
  cited_chunk_ids: z.array(z.string()),
  context: z.string(),
  answer: z.string(),
  token_count: z.number(),
  created_at: z.coerce.date(),
});

const IdRowSchema = z.object({ id: z.string() });

export class PostgresSessionStore implements SessionStore {
  private readonly table: string;
  private ready: Promise<void> | null = null;

  constructor(
    private readonly pool: PoolLike,
    tablePrefix: string
  ) {
    if (!/^[a-z_][a-z0-9_]*$/.test(tablePrefix)) {
      throw new TypeError(`Invalid table prefix "${tablePrefix}"`);
    }
    this.table = `${tablePrefix}_conversation_turns`;
  }

  async ensureSchema(): Promise<void> {
    this.ready ??= this.createSchema().catch((error: unknown) => {
      this.ready = null;
      throw error;
    });
    return this.ready;
  }

  async listTurns(sessionId: string): Promise<ConversationTurn[]> {
    await this.ensureSchema();
    const result = await this.pool.query(
      `
      SELECT id, session_id, query, retrieved_chunk_ids, cited_chunk_ids,
             context, answer, token_count, created_at
      FROM ${this.table}
      WHERE session_id = $1
      ORDER BY seq ASC
      `,
      [sessionId]
    );

    return result.rows.map((row) => {
      const r = TurnRowSchema.parse(row);
      return {
        id: r.id,
        sessionId: r.session_id,
        query: r.query,
        retrievedChunkIds: r.retrieved_chunk_ids,
        citedChunkIds: r.cited_chunk_ids,
        context: r.context,
        answer: r.answer,
        tokenCount: r.token_count,
        createdAt: r.created_at,
      };
    });
  }

  async appendTurn(turn: ConversationTurn, limits: SessionLimits): Promise<string[]> {
    await this.ensureSchema();

    return withTransaction(this.pool, async (client) => {
      await client.query(
        `
        INSERT INTO ${this.table}
          (id, session_id, query, retrieved_chunk_ids, cited_chunk_ids,
           context, answer, token_count, created_at)
        VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, $6, $7, $8, $9)
        `,
        [
          turn.id,
          turn.sessionId,
          turn.query,
          JSON.stringify(turn.retrievedChunkIds),
          JSON.stringify(turn.citedChunkIds),
          turn.context,
          turn.answer,
          turn.tokenCount,
          turn.createdAt,
        ]
      );

      const evicted = await client.query(
        `
        DELETE FROM ${this.table}
        WHERE id IN (
          SELECT id FROM (
            SELECT id,
                   ROW_NUMBER() OVER (ORDER BY seq DESC) AS rank,
                   SUM(token_count) OVER (ORDER BY seq DESC) AS running
            FROM ${this.table}
            WHERE session_id = $1
          ) ranked
          WHERE rank > $2 OR (rank > 1 AND running > $3)
        )
        RETURNING id
        `,
        [turn.sessionId, limits.maxTurns, limits.maxTokens]
      );

      return evicted.rows.map((row) => IdRowSchema.parse(row).id);
    });
  }

  async deleteSession(sessionId: string): Promise<number> {
    await this.ensureSchema();
    const result = await this.pool.query(`DELETE FROM ${this.table} WHERE session_id = $1`, [
      sessionId,
    ]);
    return result.rowCount ?? 0;
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id TEXT PRIMARY KEY,
        seq BIGSERIAL NOT NULL,
        session_id TEXT NOT NULL,
        query TEXT NOT NULL,
        retrieved_chunk_ids JSONB NOT NULL,
        cited_chunk_ids JSONB NOT NULL,
        context TEXT NOT NULL,
        answer TEXT NOT NULL,
        token_count INTEGER NOT NULL,
        created_at TIMESTAMPTZ NOT NULL
      )
    `);
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS ${this.table}_session_idx
      ON ${this.table} (session_id, seq)
    `);
  }
}
