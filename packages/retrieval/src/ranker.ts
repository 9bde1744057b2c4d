import { boundingBox, distanceKm } from "./geo.js";
import { hasCategory, hasSource, matchesPredicates, matchesText } from "./predicates.js";
import { assertNever, type RankedStrategy } from "./strategy.js";
import type { Article, ArticlePredicates } from "./types.js";

/** Relevance descending, then newest first, then id for a stable order. */
export function compareByRelevance(a: Article, b: Article): number {
  return (
    b.relevanceScore - a.relevanceScore ||
    b.publishedAt.getTime() - a.publishedAt.getTime() ||
    a.id.localeCompare(b.id)
  );
}

/**
 * Predicates an ArticleStore can use to narrow the candidate set for a
 * strategy. The ranker re-applies the exact conditions afterwards.
 */
export function predicatesFor(strategy: RankedStrategy): ArticlePredicates {
  switch (strategy.kind) {
    case "category":
      return { category: strategy.category };
    case "source":
      return { source: strategy.source };
    case "search":
      return { text: strategy.text };
    case "score":
      return { minScore: strategy.minScore };
    case "nearby":
      return {
        boundingBox: boundingBox(strategy.center, strategy.radiusKm),
        near: { center: strategy.center, radiusKm: strategy.radiusKm }
      };
    case "flexible": {
      const { near } = strategy.predicates;
      return near
        ? { ...strategy.predicates, boundingBox: boundingBox(near.center, near.radiusKm) }
        : strategy.predicates;
    }
    default:
      return assertNever(strategy);
  }
}

function byRelevance(articles: Article[], limit: number) {
  return [...articles].sort(compareByRelevance).slice(0, limit);
}

/**
 * Orders a candidate set for a strategy and keeps the first `limit` entries.
 * Articles without a coordinate never appear in a nearby result.
 */
export function rankArticles(
  strategy: RankedStrategy,
  candidates: Article[],
  limit: number
): Article[] {
  switch (strategy.kind) {
    case "search":
      return byRelevance(
        candidates.filter((article) => matchesText(article, strategy.text)),
        limit
      );
    case "category":
      return byRelevance(
        candidates.filter((article) => hasCategory(article, strategy.category)),
        limit
      );
    case "source":
      return byRelevance(
        candidates.filter((article) => hasSource(article, strategy.source)),
        limit
      );
    case "score":
      return byRelevance(
        candidates.filter((article) => article.relevanceScore >= strategy.minScore),
        limit
      );
    case "nearby": {
      const withDistance: Array<{ article: Article; distance: number }> = [];
      for (const article of candidates) {
        if (!article.location) {
          continue;
        }
        const distance = distanceKm(strategy.center, article.location);
        if (distance <= strategy.radiusKm) {
          withDistance.push({ article, distance });
        }
      }
      return withDistance
        .sort(
          (a, b) => a.distance - b.distance || compareByRelevance(a.article, b.article)
        )
        .slice(0, limit)
        .map((entry) => entry.article);
    }
    case "flexible":
      return byRelevance(
        candidates.filter((article) => matchesPredicates(article, strategy.predicates)),
        limit
      );
    default:
      return assertNever(strategy);
  }
}
