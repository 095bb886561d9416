import type { FastifyBaseLogger } from "fastify";
import type { PoolClient } from "pg";
import pool from "./db.js";

/**
 * Runs `work` inside BEGIN/COMMIT on a dedicated client. A failed ROLLBACK is
 * logged and the original error is rethrown.
 */
export async function withTransaction<T>(
  log: FastifyBaseLogger,
  work: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  let inTransaction = false;
  try {
    await client.query("BEGIN");
    inTransaction = true;
    const result = await work(client);
    await client.query("COMMIT");
    inTransaction = false;
    return result;
  } catch (err: unknown) {
    if (inTransaction) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr: unknown) {
        log.warn({ err: rollbackErr }, "rollback failed");
      }
    }
    throw err;
  } finally {
    client.release();
  }
}
