import { config as loadEnv } from "dotenv";
import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath, pathToFileURL } from "node:url";
import { join } from "node:path";
import { createPool } from "./db.js";
import { errorMessage } from "./errors.js";
import { componentLogger } from "./logger.js";

const log = componentLogger("migrate");

export const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations/", import.meta.url));

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

/**
 * Applies every `*.sql` file in `dir` not yet listed in `schema_migrations`,
 * in file name order, each in its own transaction. Returns the names applied.
 */
export async function runMigrations(client: SqlClient, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await client.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name       TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`,
  );
  const { rows } = await client.query("SELECT name FROM schema_migrations");
  const done = new Set(rows.map((r) => String(r.name)));

  const files = (await readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
  const applied: string[] = [];
  for (const name of files) {
    if (done.has(name)) continue;
    const sql = await readFile(join(dir, name), "utf8");
    // one simple-protocol round trip, so BEGIN/COMMIT share a connection
    await client.query(
      `BEGIN;\n${sql}\nINSERT INTO schema_migrations (name) VALUES ('${name.replace(/'/g, "''")}');\nCOMMIT;`,
    );
    log.info({ migration: name }, "migration applied");
    applied.push(name);
  }
  if (!applied.length) log.info("schema up to date");
  return applied;
}

async function main() {
  loadEnv();
  const url = process.env.DATABASE_URL;
  if (!url) throw new Error("DATABASE_URL is required to run migrations");
  const pool = createPool(url, process.env.PGSSL === "true");
  try {
    await runMigrations(pool);
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    log.error({ err: errorMessage(err) }, "migration failed");
    process.exitCode = 1;
  });
}
