import { promises as fs } from "fs";
import { fileURLToPath } from "url";
import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export const SCHEMA_PATH = fileURLToPath(new URL("../../db/schema.sql", import.meta.url));

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** In-process Postgres, used when DATABASE_URL is unset and by the tests. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}

export async function applySqlFile(pool: pg.Pool, filePath: string = SCHEMA_PATH): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export async function openPool(env: NodeJS.ProcessEnv = process.env): Promise<pg.Pool> {
  const url = env.DATABASE_URL;
  const pool = url ? createPgPool(url) : createMemoryPool();
  const autoSchema = (env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  if (!url || autoSchema) await applySqlFile(pool);
  return pool;
}
