import { Pool } from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import { ConfigError } from "../errors";

let pool: Pool | null = null;
let db: NodePgDatabase | null = null;

function requireDatabaseUrl(): string {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new ConfigError("DATABASE_URL is not set in the environment.");
  }
  return url;
}

export function getPool(): Pool {
  if (!pool) {
    const connectionString = requireDatabaseUrl();
    pool = new Pool({
      connectionString,
      ssl: /sslmode=require/.test(connectionString) ? { rejectUnauthorized: false } : undefined
    });
  }
  return pool;
}

export function getDb(): NodePgDatabase {
  if (!db) {
    db = drizzle(getPool());
  }
  return db;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
