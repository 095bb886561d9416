import { readdir, readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import pool, { query, close } from "./db.js";

const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), "migrations");

async function applyMigration(name: string, sql: string) {
  const client = await pool.connect();
  let inTransaction = false;
  try {
    await client.query("BEGIN");
    inTransaction = true;
    await client.query(sql);
    await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [name]);
    await client.query("COMMIT");
    inTransaction = false;
  } catch (err: unknown) {
    if (inTransaction) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        console.error(`Rollback of ${name} failed`, rollbackErr);
      });
    }
    throw err;
  } finally {
    client.release();
  }
}

async function migrate() {
  await query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  const files = (await readdir(migrationsDir)).filter((f) => f.endsWith(".sql")).sort();
  const applied = await query<{ name: string }>("SELECT name FROM schema_migrations");
  const appliedSet = new Set(applied.rows.map((r) => r.name));

  let count = 0;
  for (const file of files) {
    if (appliedSet.has(file)) continue;
    console.log(`Applying ${file}…`);
    await applyMigration(file, await readFile(join(migrationsDir, file), "utf-8"));
    count += 1;
  }

  console.log(count > 0 ? `Applied ${count} migration(s).` : "Database schema is up to date.");
}

try {
  await migrate();
} catch (err) {
  console.error(err);
  process.exitCode = 1;
} finally {
  await close();
}
