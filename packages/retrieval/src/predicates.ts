import { isInBoundingBox, isWithinRadius } from "./geo.js";
import type { Article, ArticlePredicates } from "./types.js";
import { searchTerms } from "./vocabulary.js";

export function matchesText(article: Article, text: string): boolean {
  const terms = searchTerms(text);
  if (terms.length === 0) {
    return true;
  }
  const haystack = `${article.title}\n${article.description}`.toLowerCase();
  return terms.some((term) => haystack.includes(term));
}

export function hasCategory(article: Article, category: string): boolean {
  const wanted = category.trim().toLowerCase();
  return article.categories.some((item) => item.toLowerCase() === wanted);
}

export function hasSource(article: Article, source: string): boolean {
  return article.sourceName.toLowerCase() === source.trim().toLowerCase();
}

/** Every supplied predicate must hold. */
export function matchesPredicates(
  article: Article,
  predicates: ArticlePredicates
): boolean {
  if (predicates.text !== undefined && !matchesText(article, predicates.text)) {
    return false;
  }
  if (
    predicates.category !== undefined &&
    !hasCategory(article, predicates.category)
  ) {
    return false;
  }
  if (predicates.source !== undefined && !hasSource(article, predicates.source)) {
    return false;
  }
  if (
    predicates.minScore !== undefined &&
    article.relevanceScore < predicates.minScore
  ) {
    return false;
  }
  if (
    predicates.maxScore !== undefined &&
    article.relevanceScore > predicates.maxScore
  ) {
    return false;
  }
  if (predicates.boundingBox || predicates.near) {
    if (!article.location) {
      return false;
    }
    if (
      predicates.boundingBox &&
      !isInBoundingBox(predicates.boundingBox, article.location)
    ) {
      return false;
    }
    if (
      predicates.near &&
      !isWithinRadius(predicates.near.center, article.location, predicates.near.radiusKm)
    ) {
      return false;
    }
  }
  return true;
}

export function hasPredicates(predicates: ArticlePredicates): boolean {
  return Object.values(predicates).some((value) => value !== undefined);
}
