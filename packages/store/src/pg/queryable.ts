import { readFile } from "node:fs/promises";
import pg from "pg";

/** The slice of a pg Pool or Client the repositories use. */
export interface Queryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export type PoolOptions = {
  url: string;
  poolMax: number;
};

export function createPool(options: PoolOptions): pg.Pool {
  return new pg.Pool({
    connectionString: options.url,
    max: options.poolMax
  });
}

const SCHEMA_URL = new URL("./schema.sql", import.meta.url);

export async function ensureSchema(db: Queryable): Promise<void> {
  const sql = await readFile(SCHEMA_URL, "utf8");
  await db.query(sql);
}
