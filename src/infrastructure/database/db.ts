/**
 * PostgreSQL connection pool and the narrow query surface the adapters use.
 */
import { Pool } from "pg";

import type { AppConfig } from "@config/index";
import type { LoggerPort } from "@infrastructure/logging/Logger";

export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface PoolClientLike extends Queryable {
  /** Passing an error destroys the connection instead of returning it to the pool. */
  release(destroy?: Error | boolean): void;
}

export interface PoolLike extends Queryable {
  connect(): Promise<PoolClientLike>;
}

export function createPool(config: AppConfig, logger: LoggerPort): Pool {
  const pool = new Pool({
    host: config.db.host,
    port: config.db.port,
    user: config.db.user,
    password: config.db.password,
    database: config.db.database,
    max: config.db.max,
    idleTimeoutMillis: config.db.idleTimeoutMs,
    connectionTimeoutMillis: config.db.connectionTimeoutMs,
    query_timeout: config.resilience.timeouts.vectorStoreMs,
    statement_timeout: config.resilience.timeouts.vectorStoreMs,
  });

  pool.on("error", (err: Error) => {
    logger.log("error", "PG_POOL_ERROR", { message: err.message });
  });

  return pool;
}

/**
 * Runs `work` inside BEGIN/COMMIT, rolling back when it throws. The error
 * from `work` is what the caller sees; a connection whose ROLLBACK also
 * failed is discarded rather than returned to the pool.
 */
export async function withTransaction<T>(
  pool: PoolLike,
  work: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error: unknown) {
    await client.query("ROLLBACK").catch((rollbackError: unknown) => {
      broken =
        rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    });
    throw error;
  } finally {
    client.release(broken);
  }
}
