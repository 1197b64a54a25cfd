/**
 * Applies the SQL files in drizzle/ in name order. Each file runs once;
 * applied names are tracked in campaign_migrations.
 *
 * Run:
 *   npx tsx scripts/migrate.ts
 */
import * as dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
dotenv.config({ path: ".env" });

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { Pool } from "pg";

const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "drizzle");

async function main() {
  if (!process.env.DATABASE_URL) {
    throw new Error("DATABASE_URL missing (set it in .env/.env.local)");
  }

  const pool = new Pool({ connectionString: process.env.DATABASE_URL });
  const client = await pool.connect();
  try {
    await client.query(
      "CREATE TABLE IF NOT EXISTS campaign_migrations (name text PRIMARY KEY, applied_at timestamptz NOT NULL DEFAULT now())"
    );
    const applied = await client.query<{ name: string }>("SELECT name FROM campaign_migrations");
    const appliedNames = new Set(applied.rows.map((row) => row.name));

    const files = fs
      .readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith(".sql"))
      .sort();

    for (const file of files) {
      if (appliedNames.has(file)) {
        console.log(`[Migrate] ${file} already applied`);
        continue;
      }
      const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), "utf8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO campaign_migrations (name) VALUES ($1)", [file]);
        await client.query("COMMIT");
        console.log(`[Migrate] Applied ${file}`);
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    }
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((error) => {
  console.error("[Migrate] Failed:", error);
  process.exit(1);
});
