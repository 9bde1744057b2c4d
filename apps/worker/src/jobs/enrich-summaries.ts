import { summarizeArticle, type Article } from "@geonews/retrieval";

import type { WorkerContext } from "../context.js";
import { workerMetrics } from "../metrics/registry.js";

export type EnrichmentOutcome = "success" | "skipped" | "failed";

export type EnrichmentBatchResult = Record<EnrichmentOutcome, number>;

export async function processMissingSummaries(
  context: WorkerContext
): Promise<EnrichmentBatchResult> {
  const result: EnrichmentBatchResult = { success: 0, skipped: 0, failed: 0 };
  const pending = await context.repositories.articles.listMissingSummary(
    context.config.enrichment.batchSize
  );

  if (pending.length === 0) {
    context.logger.debug("No articles missing a summary");
    return result;
  }

  context.logger.info({ count: pending.length }, "Starting summary back-fill");

  const outcomes = await Promise.all(
    pending.map((article) =>
      context.enrichmentQueue.add(() => summarize(context, article), {
        throwOnTimeout: true
      })
    )
  );
  workerMetrics.enrichmentQueueSize.set(context.enrichmentQueue.size);

  for (const outcome of outcomes) {
    result[outcome]++;
  }

  context.logger.info(result, "Summary back-fill finished");
  return result;
}

async function summarize(context: WorkerContext, article: Article): Promise<EnrichmentOutcome> {
  const timer = workerMetrics.enrichmentDuration.startTimer({ status: "in_progress" });

  try {
    const summary = summarizeArticle(article.title, article.description);
    if (!summary) {
      timer({ status: "skipped" });
      workerMetrics.enrichmentAttempts.inc({ status: "skipped" });
      return "skipped";
    }

    const updated = await context.repositories.articles.setSummary(article.id, summary);
    const status = updated ? "success" : "skipped";
    timer({ status });
    workerMetrics.enrichmentAttempts.inc({ status });
    return status;
  } catch (error) {
    timer({ status: "failed" });
    workerMetrics.enrichmentAttempts.inc({ status: "failed" });
    context.logger.error({ articleId: article.id, err: error }, "Summary back-fill failed");
    return "failed";
  }
}

export function startEnrichmentScheduler(context: WorkerContext) {
  let isRunning = false;
  const intervalMs = context.config.enrichment.intervalMs;

  const execute = async () => {
    if (isRunning) {
      context.logger.debug("Enrichment already running, skipping tick");
      return;
    }

    isRunning = true;
    try {
      await processMissingSummaries(context);
    } catch (error) {
      context.logger.error({ err: error }, "Enrichment tick failed");
    } finally {
      isRunning = false;
    }
  };

  void execute();

  const timer = setInterval(() => {
    void execute();
  }, intervalMs);

  return {
    stop: () => {
      clearInterval(timer);
    }
  };
}
