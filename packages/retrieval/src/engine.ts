import type { Logger } from "@geonews/logger";

import { IntentResolver } from "./intent.js";
import type { IntentResolution } from "./intent-types.js";
import type { EntityAnalyzer } from "./nlp/analyzer.js";
import { predicatesFor, rankArticles } from "./ranker.js";
import {
  TrendingResultCache,
  type CacheLookupOutcome,
  type TrendingLookup
} from "./result-cache.js";
import {
  flexibleStrategy,
  hasExplicitFilters,
  selectStrategy,
  type ExplicitFilters,
  type RankedStrategy,
  type RetrievalStrategy,
  type StrategyKind
} from "./strategy.js";
import { TrendingScorer } from "./trending.js";
import type {
  Article,
  ArticleStore,
  Clock,
  GeoPoint,
  InteractionStore,
  TrendingResult
} from "./types.js";
import type { ClusterCell } from "./geo.js";
import type { Vocabulary } from "./vocabulary.js";

export type RetrievalDefaults = {
  limit: number;
  radiusKm: number;
  scoreThreshold: number;
};

export const DEFAULT_RETRIEVAL: RetrievalDefaults = {
  limit: 5,
  radiusKm: 10,
  scoreThreshold: 0.7
};

export type RetrievalObservation = {
  strategy: StrategyKind;
  count: number;
  durationMs: number;
};

export type RetrievalEngineOptions = {
  articles: ArticleStore;
  interactions: InteractionStore;
  analyzer: EntityAnalyzer;
  logger: Logger;
  vocabulary?: Vocabulary;
  defaults?: Partial<RetrievalDefaults>;
  nlpTimeoutMs?: number;
  trending?: {
    cacheTtlMs?: number;
    interactionWindowHours?: number;
  };
  now?: Clock;
  onResolved?: (resolution: IntentResolution) => void;
  onRetrieved?: (observation: RetrievalObservation) => void;
  onCacheLookup?: (outcome: CacheLookupOutcome, clusterKey: string) => void;
};

export type NewsQuery = {
  text: string;
  coordinate?: GeoPoint;
  radiusKm?: number;
  limit?: number;
  filters?: ExplicitFilters;
};

export type NewsQueryResult =
  | {
      kind: "articles";
      resolution: IntentResolution | null;
      strategy: RankedStrategy;
      articles: Article[];
    }
  | {
      kind: "trending";
      resolution: IntentResolution;
      strategy: Extract<RetrievalStrategy, { kind: "trending" }>;
      trending: TrendingLookup;
    };

export class RetrievalEngine {
  readonly resolver: IntentResolver;
  readonly cache: TrendingResultCache;
  readonly defaults: RetrievalDefaults;
  private readonly articles: ArticleStore;
  private readonly interactions: InteractionStore;
  private readonly scorer: TrendingScorer;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly onRetrieved?: (observation: RetrievalObservation) => void;

  constructor(options: RetrievalEngineOptions) {
    this.articles = options.articles;
    this.interactions = options.interactions;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.defaults = { ...DEFAULT_RETRIEVAL, ...options.defaults };
    this.onRetrieved = options.onRetrieved;

    this.resolver = new IntentResolver({
      analyzer: options.analyzer,
      logger: options.logger.child({ component: "intent" }),
      vocabulary: options.vocabulary,
      timeoutMs: options.nlpTimeoutMs,
      onResolved: options.onResolved
    });
    this.scorer = new TrendingScorer({
      interactionWindowHours: options.trending?.interactionWindowHours
    });
    this.cache = new TrendingResultCache({
      recompute: (cell, computedAt) => this.computeTrending(cell, computedAt),
      logger: options.logger.child({ component: "trending-cache" }),
      ttlMs: options.trending?.cacheTtlMs,
      now: this.now,
      onLookup: options.onCacheLookup
    });
  }

  resolve(text: string, coordinate?: GeoPoint): Promise<IntentResolution> {
    return this.resolver.resolve(text, coordinate);
  }

  resolveQuery(text: string, coordinate?: GeoPoint) {
    return this.resolver.resolveQuery(text, coordinate);
  }

  async retrieve(
    strategy: RankedStrategy,
    options: { limit?: number } = {}
  ): Promise<Article[]> {
    const limit = options.limit ?? this.defaults.limit;
    const startedAt = performance.now();
    const candidates = await this.articles.query(predicatesFor(strategy));
    const articles = rankArticles(strategy, candidates, limit);
    const durationMs = performance.now() - startedAt;

    this.onRetrieved?.({ strategy: strategy.kind, count: articles.length, durationMs });
    if (articles.length === 0) {
      this.logger.info({ strategy }, "Retrieval returned no articles");
    }
    return articles;
  }

  async trending(
    coordinate: GeoPoint,
    options: { limit?: number; forceRefresh?: boolean } = {}
  ): Promise<TrendingLookup> {
    const limit = options.limit ?? this.defaults.limit;
    const lookup = await this.cache.lookup(coordinate, {
      forceRefresh: options.forceRefresh
    });
    return { ...lookup, results: lookup.results.slice(0, limit) };
  }

  /**
   * End-to-end handling of a free-text request. Explicit filters skip
   * intent resolution and produce a flexible strategy.
   */
  async query(request: NewsQuery): Promise<NewsQueryResult> {
    const radiusKm = request.radiusKm ?? this.defaults.radiusKm;
    const limit = request.limit ?? this.defaults.limit;

    if (hasExplicitFilters(request.filters)) {
      const strategy = flexibleStrategy(request.filters, {
        text: request.text,
        coordinate: request.coordinate,
        radiusKm
      });
      return this.articlesFor(null, strategy, limit);
    }

    const resolution = await this.resolve(request.text, request.coordinate);
    const strategy = selectStrategy(resolution.intent, {
      text: request.text,
      coordinate: request.coordinate,
      radiusKm,
      scoreThreshold: this.defaults.scoreThreshold
    });

    if (strategy.kind === "trending") {
      const trending = await this.trending(strategy.center, { limit });
      return { kind: "trending", resolution, strategy, trending };
    }
    return this.articlesFor(resolution, strategy, limit);
  }

  private async articlesFor(
    resolution: IntentResolution | null,
    strategy: RankedStrategy,
    limit: number
  ): Promise<NewsQueryResult> {
    const articles = await this.retrieve(strategy, { limit });
    return { kind: "articles", resolution, strategy, articles };
  }

  private async computeTrending(
    cell: ClusterCell,
    computedAt: Date
  ): Promise<TrendingResult[]> {
    const since = this.scorer.windowStart(computedAt);
    const articles = await this.articles.query({});
    const scored = await Promise.all(
      articles.map(async (article) => {
        const events = await this.interactions.eventsFor(article.id, { since });
        const { score, displayScore, factors } = this.scorer.score(
          article,
          events,
          cell.center,
          computedAt
        );
        return {
          article,
          score,
          displayScore,
          factors,
          clusterKey: cell.key,
          computedAt
        };
      })
    );

    return scored.sort(
      (a, b) => b.score - a.score || a.article.id.localeCompare(b.article.id)
    );
  }
}
