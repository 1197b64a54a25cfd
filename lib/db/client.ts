import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import { requireConfigValue } from "@/lib/campaign-config";
import * as schema from "@/lib/db/schema";

export type CampaignDatabase = NodePgDatabase<typeof schema>;

// One pool per process; the cron script closes it on exit.
let pool: Pool | null = null;
let db: CampaignDatabase | null = null;

export function getPool(databaseUrl: string | null = process.env.DATABASE_URL ?? null): Pool {
  if (!pool) {
    pool = new Pool({ connectionString: requireConfigValue(databaseUrl, "DATABASE_URL"), max: 5 });
    pool.on("error", (error) => {
      console.error("[DB] Idle client error:", error);
    });
  }
  return pool;
}

export function getDb(databaseUrl?: string | null): CampaignDatabase {
  if (!db) {
    db = drizzle(getPool(databaseUrl), { schema });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  const current = pool;
  pool = null;
  db = null;
  if (current) await current.end();
}
