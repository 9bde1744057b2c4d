export * from "./types.js";
export * from "./memory.js";
export * from "./repositories.js";
export { createPool, ensureSchema, type Queryable, type PoolOptions } from "./pg/queryable.js";
export { buildArticleQuery, type SqlQuery } from "./pg/sql.js";
export { PgArticleRepository, PgInteractionRepository } from "./pg/repositories.js";
export * from "./seed/records.js";
export * from "./seed/simulate.js";
export * from "./seed/seed.js";
