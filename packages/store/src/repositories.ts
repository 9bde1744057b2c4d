import type { Logger } from "@geonews/logger";

import { createMemoryRepositories } from "./memory.js";
import { createPool, ensureSchema } from "./pg/queryable.js";
import { PgArticleRepository, PgInteractionRepository } from "./pg/repositories.js";
import type { Repositories } from "./types.js";

export type StoreConfig = {
  url?: string;
  poolMax: number;
};

/** PostgreSQL when a database URL is configured, otherwise process-local memory. */
export async function createRepositories(
  config: StoreConfig,
  logger: Logger
): Promise<Repositories & { kind: "postgres" | "memory" }> {
  if (!config.url) {
    logger.warn("DATABASE_URL not set, using in-memory storage");
    return { kind: "memory", ...createMemoryRepositories() };
  }

  const pool = createPool({ url: config.url, poolMax: config.poolMax });
  pool.on("error", (error) => {
    logger.error({ err: error }, "Idle PostgreSQL client error");
  });

  await ensureSchema(pool);
  logger.info({ poolMax: config.poolMax }, "Connected to PostgreSQL");

  return {
    kind: "postgres",
    articles: new PgArticleRepository(pool),
    interactions: new PgInteractionRepository(pool),
    close: () => pool.end()
  };
}
