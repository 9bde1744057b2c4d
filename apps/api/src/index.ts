import { loadConfig } from "@geonews/config";
import { createLogger } from "@geonews/logger";
import { RetrievalEngine, createEntityAnalyzer } from "@geonews/retrieval";
import { createRepositories, seedArticles, seedInteractions } from "@geonews/store";

import { buildServer } from "./app.js";
import { createEngineObservers } from "./metrics/engine-observers.js";
import { metrics } from "./metrics/registry.js";

const logger = createLogger({ name: "api" }).child({ service: "api" });

async function main() {
  const config = loadConfig();

  const repositories = await createRepositories(config.database, logger);

  // In-memory storage starts empty in every process.
  if (repositories.kind === "memory" && config.seed.enabled) {
    await seedArticles(repositories.articles, config.seed.dataPath, logger);
    if (config.seed.simulateInteractions) {
      await seedInteractions(repositories.articles, repositories.interactions, logger);
    }
  }

  const analyzer = createEntityAnalyzer(config.nlp);
  const engine = new RetrievalEngine({
    articles: repositories.articles,
    interactions: repositories.interactions,
    analyzer,
    logger,
    nlpTimeoutMs: config.nlp.timeoutMs,
    defaults: {
      limit: config.retrieval.defaultLimit,
      radiusKm: config.retrieval.defaultRadiusKm,
      scoreThreshold: config.retrieval.scoreThreshold
    },
    trending: {
      cacheTtlMs: config.trending.cacheTtlMs,
      interactionWindowHours: config.trending.interactionWindowHours
    },
    ...createEngineObservers(metrics)
  });

  const server = await buildServer({
    logger,
    repositories,
    storeKind: repositories.kind,
    engine,
    analyzer,
    retrieval: config.retrieval
  });

  const sweeper = setInterval(() => {
    const removed = engine.cache.sweep();
    if (removed > 0) {
      metrics.trendingCacheSweeps.inc(removed);
    }
  }, config.trending.sweepIntervalMs);
  sweeper.unref();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutting down API server");
    clearInterval(sweeper);
    try {
      await server.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "Failed to close API server");
      process.exit(1);
    }
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  try {
    await server.listen({
      port: config.server.port,
      host: config.server.host
    });
    logger.info(
      { port: config.server.port, host: config.server.host },
      "API server started"
    );
  } catch (error) {
    logger.error(error, "Failed to start API server");
    process.exit(1);
  }
}

void main();
