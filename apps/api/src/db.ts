import pg from "pg";
import { databaseUrl } from "./config.js";

const pool = new pg.Pool({
  connectionString: databaseUrl(process.env),
});

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
) {
  return pool.query<T>(text, params);
}

export async function close() {
  await pool.end();
}

export default pool;
