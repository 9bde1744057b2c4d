import type {
  Article,
  InteractionEvent,
  IntentResolution,
  NewsQueryResult,
  TrendingLookup,
  TrendingResult
} from "@geonews/retrieval";

export function serializeArticle(article: Article) {
  return {
    id: article.id,
    title: article.title,
    description: article.description,
    url: article.url,
    publishedAt: article.publishedAt.toISOString(),
    sourceName: article.sourceName,
    categories: article.categories,
    relevanceScore: article.relevanceScore,
    location: article.location
      ? { latitude: article.location.latitude, longitude: article.location.longitude }
      : null,
    summary: article.summary
  };
}

export function serializeTrendingResult(result: TrendingResult) {
  return {
    ...serializeArticle(result.article),
    trendingScore: result.displayScore,
    score: result.score,
    factors: result.factors
  };
}

export function serializeTrending(lookup: TrendingLookup) {
  return {
    clusterKey: lookup.clusterKey,
    center: lookup.center,
    computedAt: lookup.computedAt.toISOString(),
    stale: lookup.stale,
    articles: lookup.results.map(serializeTrendingResult)
  };
}

function serializeResolution(resolution: IntentResolution | null) {
  if (!resolution) {
    return {
      intent: "flexible",
      confidence: 1,
      resolution: "explicit",
      entities: []
    };
  }
  return {
    intent: resolution.intent.kind,
    confidence: resolution.intent.confidence,
    resolution: resolution.kind,
    ...(resolution.kind === "fallback" ? { reason: resolution.reason } : {}),
    entities: resolution.intent.entities
  };
}

export function serializeQueryResult(result: NewsQueryResult) {
  if (result.kind === "trending") {
    const { articles, ...cluster } = serializeTrending(result.trending);
    return {
      ...serializeResolution(result.resolution),
      strategy: result.strategy,
      count: articles.length,
      articles,
      trending: cluster
    };
  }
  return {
    ...serializeResolution(result.resolution),
    strategy: result.strategy,
    count: result.articles.length,
    articles: result.articles.map(serializeArticle)
  };
}

export function serializeInteraction(event: InteractionEvent) {
  return {
    id: event.id,
    articleId: event.articleId,
    kind: event.kind,
    occurredAt: event.occurredAt.toISOString(),
    userId: event.userId,
    userLocation: event.userLocation
  };
}
