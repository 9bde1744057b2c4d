import Fastify from "fastify";
import { loadConfig } from "@geonews/config";
import { createLogger } from "@geonews/logger";

import { createWorkerContext, type WorkerContext } from "./context.js";
import { seedStore } from "./jobs/seed-data.js";
import { startEnrichmentScheduler } from "./jobs/enrich-summaries.js";
import { workerMetrics } from "./metrics/registry.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger({ name: "worker" });

  if (!config.database.url) {
    logger.error("DATABASE_URL is required; in-memory data would not be shared with the API");
    process.exit(1);
  }

  const context = await createWorkerContext({ config, logger });

  context.logger.info(
    {
      enrichmentConcurrency: context.config.enrichment.concurrency,
      enrichmentBatchSize: context.config.enrichment.batchSize
    },
    "Worker service bootstrap complete"
  );

  await seedStore(context);
  workerMetrics.enrichmentQueueSize.set(context.enrichmentQueue.size);

  const enrichmentScheduler = startEnrichmentScheduler(context);
  const metricsServer = await startMetricsServer(context);

  const shutdown = async (signal?: string) => {
    context.logger.info({ signal }, "Shutting down worker");
    enrichmentScheduler.stop();

    if (metricsServer) {
      await metricsServer.close();
    }

    await context.enrichmentQueue.onIdle();
    await context.repositories.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  process.on("unhandledRejection", (reason) => {
    context.logger.error({ reason }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    context.logger.error({ err: error }, "Uncaught exception");
  });
}

void main();

async function startMetricsServer(context: WorkerContext) {
  if (!context.config.monitoring.enabled) {
    context.logger.info("Metrics server disabled via configuration");
    return null;
  }

  const server = Fastify({ logger: false });

  server.get("/metrics", async (_request, reply) => {
    reply.header("Content-Type", workerMetrics.registry.contentType);
    return workerMetrics.registry.metrics();
  });

  await server.listen({
    port: context.config.monitoring.metricsPort,
    host: context.config.monitoring.metricsHost
  });

  context.logger.info(
    {
      port: context.config.monitoring.metricsPort,
      host: context.config.monitoring.metricsHost
    },
    "Metrics endpoint listening"
  );

  return server;
}
