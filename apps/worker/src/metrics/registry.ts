import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";

const registry = new Registry();

collectDefaultMetrics({
  prefix: "geonews_worker_",
  register: registry
});

const seedArticles = new Counter({
  name: "geonews_worker_seed_articles_total",
  help: "Number of articles inserted from the sample data file",
  registers: [registry]
});

const simulatedInteractions = new Counter({
  name: "geonews_worker_simulated_interactions_total",
  help: "Number of simulated interaction events appended",
  registers: [registry]
});

const enrichmentDuration = new Histogram({
  name: "geonews_worker_enrichment_duration_seconds",
  help: "Duration of article summary jobs in seconds",
  registers: [registry],
  labelNames: ["status"]
});

const enrichmentAttempts = new Counter({
  name: "geonews_worker_enrichment_attempts_total",
  help: "Number of summary attempts grouped by status",
  registers: [registry],
  labelNames: ["status"]
});

const enrichmentQueueSize = new Gauge({
  name: "geonews_worker_enrichment_queue_size",
  help: "Current size of the enrichment queue",
  registers: [registry]
});

export const workerMetrics = {
  registry,
  seedArticles,
  simulatedInteractions,
  enrichmentDuration,
  enrichmentAttempts,
  enrichmentQueueSize
};
