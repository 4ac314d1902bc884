import { sql } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import type { Config } from "./config";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

// mirrors ./schema.ts; the bot creates its tables on startup
const DDL = `
CREATE TABLE IF NOT EXISTS records (
  id BIGSERIAL PRIMARY KEY,
  user_id BIGINT NOT NULL,
  type TEXT NOT NULL,
  category TEXT,
  amount NUMERIC(12,2) NOT NULL,
  description TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now()
);
CREATE INDEX IF NOT EXISTS records_user_created_idx
  ON records (user_id, created_at);
CREATE TABLE IF NOT EXISTS allowed_users (
  id SERIAL PRIMARY KEY,
  user_id BIGINT NOT NULL UNIQUE,
  username TEXT,
  first_name TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now()
);
`;

export function createDb(config: Pick<Config, "databaseUrl" | "databaseSsl">) {
  const pool = new Pool({
    connectionString: config.databaseUrl,
    // hosted postgres usually presents a certificate we cannot verify
    ssl: config.databaseSsl ? { rejectUnauthorized: false } : false,
  });
  const db: Database = drizzle(pool, { schema });
  return { db, pool };
}

export async function ensureSchema(db: Database) {
  await db.execute(sql.raw(DDL));
}
