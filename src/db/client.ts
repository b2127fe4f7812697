import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../../drizzle/schema";

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;
let db: Database | null = null;

export function resolveConnectionString(env: NodeJS.ProcessEnv = process.env): string | null {
  return env.POSTGRES_URL_NON_POOLING ?? env.POSTGRES_URL ?? env.DATABASE_URL ?? null;
}

export function getDb(connectionString: string | null = resolveConnectionString()): Database {
  if (db) {
    return db;
  }
  if (!connectionString) {
    throw new Error("Database connection string is not configured.");
  }
  pool = new Pool({ connectionString });
  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
  db = null;
}

export * as schema from "../../drizzle/schema";
