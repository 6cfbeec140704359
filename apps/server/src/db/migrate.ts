import fs from "node:fs";
import path from "node:path";
import { loadEnv, serverRoot } from "../config";
import { createLogger } from "../lib/logger";
import { createPool, withClient } from "./index";

const SQL_DIR = path.join(serverRoot, "sql");

async function main(): Promise<void> {
  const env = loadEnv();
  const log = createLogger(env.LOG_LEVEL);
  const pool = createPool(env.DATABASE_URL);
  const files = fs
    .readdirSync(SQL_DIR)
    .filter((f) => /^\d+_.*\.sql$/.test(f))
    .sort();

  try {
    await withClient(pool, async (c) => {
      await c.query("BEGIN");
      try {
        await c.query(`CREATE TABLE IF NOT EXISTS schema_migrations (version TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT now())`);
        const { rows } = await c.query<{ version: string }>("SELECT version FROM schema_migrations");
        const applied = new Set(rows.map((r) => r.version));

        for (const f of files) {
          if (applied.has(f)) continue;
          const sql = fs.readFileSync(path.join(SQL_DIR, f), "utf8");
          await c.query(sql);
          await c.query("INSERT INTO schema_migrations(version) VALUES($1)", [f]);
          log.info({ migration: f }, "applied migration");
        }

        await c.query("COMMIT");
      } catch (e) {
        await c.query("ROLLBACK");
        throw e;
      }
    });
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
