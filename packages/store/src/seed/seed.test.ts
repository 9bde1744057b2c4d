import { describe, expect, it } from "vitest";
import { createLogger } from "@geonews/logger";

import { MemoryArticleRepository, MemoryInteractionRepository } from "../memory.js";
import { loadArticleRecords, recordToArticle } from "./records.js";
import { seedArticles, seedInteractions } from "./seed.js";

const logger = createLogger({ name: "seed-test" });
const fixture = new URL("./__fixtures__/articles.json", import.meta.url);
const invalid = new URL("./__fixtures__/invalid.json", import.meta.url);
const naiveDate = new URL("./__fixtures__/naive-date.json", import.meta.url);

describe("loadArticleRecords", () => {
  it("maps records into articles", async () => {
    const records = await loadArticleRecords(fixture);

    expect(records).toHaveLength(3);
    const article = recordToArticle(records[1]);
    expect(article.publishedAt).toEqual(new Date("2024-05-02T04:30:00Z"));
    expect(article.categories).toEqual(["business", "technology"]);
    expect(article.location).toBeNull();
    expect(recordToArticle(records[0]).location).toEqual({
      latitude: 19.076,
      longitude: 72.8777
    });
  });

  it("reads timestamps without an offset as UTC", async () => {
    const records = await loadArticleRecords(naiveDate);

    expect(records).toHaveLength(1);
    expect(recordToArticle(records[0]).publishedAt).toEqual(
      new Date("2025-03-24T11:06:31Z")
    );
  });

  it("reports every invalid field", async () => {
    await expect(loadArticleRecords(invalid)).rejects.toThrow(/0\.url: Invalid url/);
    await expect(loadArticleRecords(invalid)).rejects.toThrow(/0\.relevance_score/);
  });
});

describe("seedArticles", () => {
  it("inserts unseen articles with a generated summary", async () => {
    const repository = new MemoryArticleRepository();

    expect(await seedArticles(repository, fixture, logger)).toEqual({ loaded: 3, inserted: 3 });
    expect(await seedArticles(repository, fixture, logger)).toEqual({ loaded: 3, inserted: 0 });
    expect((await repository.findById("fixture-3"))?.summary).toBe(
      "Local team wins derby. A late goal settled it."
    );
  });
});

describe("seedInteractions", () => {
  it("simulates activity only while the store is empty", async () => {
    const articles = new MemoryArticleRepository();
    const interactions = new MemoryInteractionRepository();
    await seedArticles(articles, fixture, logger);

    const created = await seedInteractions(articles, interactions, logger, {
      random: () => 0
    });

    // 9 + 6 + 3 events for relevance 0.9, 0.6 and 0.3
    expect(created).toBe(18);
    expect(await interactions.count()).toBe(18);
    expect(await seedInteractions(articles, interactions, logger)).toBe(0);
  });
});
