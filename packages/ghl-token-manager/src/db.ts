import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { schema } from "./models.js";
import type { DB } from "./drizzleStore.js";

export function createPool(connectionString: string, ssl = false) {
  return new Pool({
    connectionString,
    ssl: ssl ? { rejectUnauthorized: false } : undefined,
  });
}

export function createDb(pool: Pool): DB {
  return drizzle(pool, { schema });
}
