import { describe, expect, it } from "vitest";

import { predicatesFor, rankArticles } from "./ranker.js";
import type { Article } from "./types.js";

function article(overrides: Partial<Article> & Pick<Article, "id">): Article {
  return {
    title: `Article ${overrides.id}`,
    description: "",
    url: `https://example.com/${overrides.id}`,
    publishedAt: new Date("2024-05-01T00:00:00Z"),
    sourceName: "Reuters",
    categories: ["general"],
    relevanceScore: 0.5,
    location: null,
    summary: null,
    ...overrides
  };
}

const mumbai = { latitude: 19.076, longitude: 72.8777 };

const articles: Article[] = [
  article({
    id: "a1",
    categories: ["Technology"],
    relevanceScore: 0.9,
    location: mumbai
  }),
  article({
    id: "a2",
    title: "Startup funding round closes",
    categories: ["technology", "business"],
    sourceName: "TechCrunch",
    relevanceScore: 0.8,
    publishedAt: new Date("2024-05-02T00:00:00Z"),
    location: { latitude: 19.1, longitude: 72.9 }
  }),
  article({
    id: "a3",
    categories: ["sports"],
    sourceName: "BBC News",
    relevanceScore: 0.95,
    publishedAt: new Date("2024-04-30T00:00:00Z")
  }),
  article({
    id: "a4",
    description: "Banks expand funding for small firms",
    categories: ["business"],
    relevanceScore: 0.6,
    publishedAt: new Date("2024-05-03T00:00:00Z"),
    location: { latitude: 19.076, longitude: 73.977 }
  }),
  article({
    id: "a5",
    categories: ["technology"],
    relevanceScore: 0.9,
    publishedAt: new Date("2024-05-02T00:00:00Z")
  })
];

function ids(result: Article[]) {
  return result.map((item) => item.id);
}

describe("rankArticles", () => {
  it("orders a category by relevance, then recency", () => {
    expect(
      ids(rankArticles({ kind: "category", category: "technology" }, articles, 5))
    ).toEqual(["a5", "a1", "a2"]);
  });

  it("applies the limit after ordering", () => {
    expect(
      ids(rankArticles({ kind: "category", category: "technology" }, articles, 2))
    ).toEqual(["a5", "a1"]);
  });

  it("matches sources case-insensitively", () => {
    expect(ids(rankArticles({ kind: "source", source: "reuters" }, articles, 5))).toEqual([
      "a5",
      "a1",
      "a4"
    ]);
  });

  it("keeps only articles at or above the score threshold", () => {
    expect(ids(rankArticles({ kind: "score", minScore: 0.85 }, articles, 5))).toEqual([
      "a3",
      "a5",
      "a1"
    ]);
  });

  it("matches any search term in title or description", () => {
    expect(
      ids(rankArticles({ kind: "search", text: "funding round" }, articles, 5))
    ).toEqual(["a2", "a4"]);
  });

  it("orders nearby articles by distance and skips those without a location", () => {
    expect(
      ids(rankArticles({ kind: "nearby", center: mumbai, radiusKm: 10 }, articles, 5))
    ).toEqual(["a1", "a2"]);
  });

  it("requires every flexible predicate", () => {
    expect(
      ids(
        rankArticles(
          { kind: "flexible", predicates: { category: "technology", source: "Reuters" } },
          articles,
          5
        )
      )
    ).toEqual(["a5", "a1"]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(rankArticles({ kind: "category", category: "politics" }, articles, 5)).toEqual([]);
  });
});

describe("predicatesFor", () => {
  it("adds a bounding box prefilter for nearby", () => {
    const predicates = predicatesFor({ kind: "nearby", center: mumbai, radiusKm: 10 });
    expect(predicates.near).toEqual({ center: mumbai, radiusKm: 10 });
    expect(predicates.boundingBox?.minLatitude).toBeLessThan(mumbai.latitude);
    expect(predicates.boundingBox?.maxLatitude).toBeGreaterThan(mumbai.latitude);
  });

  it("passes flexible predicates through", () => {
    expect(
      predicatesFor({ kind: "flexible", predicates: { source: "CNN", maxScore: 0.4 } })
    ).toEqual({ source: "CNN", maxScore: 0.4 });
  });
});

describe("rankArticles flexible score range", () => {
  const scored = [0.5, 0.7, 0.95, 0.6, 0.85].map((relevanceScore, index) =>
    article({ id: `s${index + 1}`, relevanceScore })
  );

  it("keeps only articles inside the min and max score", () => {
    const result = rankArticles(
      { kind: "flexible", predicates: { minScore: 0.9, maxScore: 1 } },
      scored,
      5
    );

    expect(result.map((item) => item.id)).toEqual(["s3"]);
  });

  it("treats both bounds as inclusive", () => {
    const result = rankArticles(
      { kind: "flexible", predicates: { minScore: 0.6, maxScore: 0.85 } },
      scored,
      5
    );

    expect(result.map((item) => item.id)).toEqual(["s5", "s2", "s4"]);
  });
});
