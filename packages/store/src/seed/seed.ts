import { summarizeArticle } from "@geonews/retrieval";
import type { Logger } from "@geonews/logger";

import type { ArticleRepository, InteractionRepository } from "../types.js";
import { loadArticleRecords, recordToArticle } from "./records.js";
import { simulateInteractions, type SimulationOptions } from "./simulate.js";

export type SeedResult = {
  loaded: number;
  inserted: number;
};

/** Inserts articles from the data file that are not stored yet, each with an extractive summary. */
export async function seedArticles(
  repository: ArticleRepository,
  dataPath: string | URL,
  logger: Logger
): Promise<SeedResult> {
  const records = await loadArticleRecords(dataPath);
  const articles = records.map((record) => {
    const article = recordToArticle(record);
    return { ...article, summary: summarizeArticle(article.title, article.description) };
  });

  const inserted = await repository.insert(articles);
  logger.info({ dataPath: String(dataPath), loaded: records.length, inserted }, "Seeded articles");
  return { loaded: records.length, inserted };
}

const SIMULATED_ARTICLE_LIMIT = 50;

/** Generates simulated activity once; does nothing when interactions already exist. */
export async function seedInteractions(
  articles: ArticleRepository,
  interactions: InteractionRepository,
  logger: Logger,
  options: SimulationOptions = {}
): Promise<number> {
  const existing = await interactions.count();
  if (existing > 0) {
    logger.debug({ existing }, "Interactions already present, skipping simulation");
    return 0;
  }

  const sample = (await articles.query({})).slice(0, SIMULATED_ARTICLE_LIMIT);
  const events = simulateInteractions(sample, options);
  await interactions.append(events);
  logger.info({ articles: sample.length, events: events.length }, "Simulated interactions");
  return events.length;
}
