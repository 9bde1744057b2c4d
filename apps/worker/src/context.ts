import PQueue from "p-queue";

import { createLogger, type Logger } from "@geonews/logger";
import { loadConfig, type AppConfig } from "@geonews/config";
import { createRepositories, type Repositories } from "@geonews/store";

export type WorkerContext = {
  config: AppConfig;
  logger: Logger;
  repositories: Repositories;
  enrichmentQueue: PQueue;
};

export async function createWorkerContext(
  overrides: Partial<Pick<WorkerContext, "config" | "logger" | "repositories">> = {}
): Promise<WorkerContext> {
  const config = overrides.config ?? loadConfig();
  const logger = overrides.logger ?? createLogger({ name: "worker" });

  const repositories =
    overrides.repositories ?? (await createRepositories(config.database, logger));

  const enrichmentQueue = new PQueue({
    concurrency: config.enrichment.concurrency
  });

  return {
    config,
    logger,
    repositories,
    enrichmentQueue
  };
}
