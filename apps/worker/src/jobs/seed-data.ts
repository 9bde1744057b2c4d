import { seedArticles, seedInteractions } from "@geonews/store";

import type { WorkerContext } from "../context.js";
import { workerMetrics } from "../metrics/registry.js";

export type SeedOutcome = {
  insertedArticles: number;
  simulatedInteractions: number;
};

/** Loads the sample articles and, once per store, a burst of simulated traffic. */
export async function seedStore(context: WorkerContext): Promise<SeedOutcome> {
  const { config, logger, repositories } = context;

  if (!config.seed.enabled) {
    logger.info("Seeding disabled via configuration");
    return { insertedArticles: 0, simulatedInteractions: 0 };
  }

  const { inserted } = await seedArticles(
    repositories.articles,
    config.seed.dataPath,
    logger
  );
  workerMetrics.seedArticles.inc(inserted);

  let simulated = 0;
  if (config.seed.simulateInteractions) {
    simulated = await seedInteractions(
      repositories.articles,
      repositories.interactions,
      logger
    );
    workerMetrics.simulatedInteractions.inc(simulated);
  }

  return { insertedArticles: inserted, simulatedInteractions: simulated };
}
