export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface Article {
  id: string;
  title: string;
  description: string;
  url: string;
  publishedAt: Date;
  sourceName: string;
  categories: string[];
  /** 0.0 – 1.0 */
  relevanceScore: number;
  location: GeoPoint | null;
  /** Populated lazily by the summary back-fill. */
  summary: string | null;
}

export const INTERACTION_KINDS = [
  "view",
  "click",
  "share",
  "bookmark",
  "comment"
] as const;

export type InteractionKind = (typeof INTERACTION_KINDS)[number];

export interface InteractionEvent {
  id: string;
  articleId: string;
  kind: InteractionKind;
  occurredAt: Date;
  userId: string | null;
  userLocation: GeoPoint | null;
}

export interface BoundingBox {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
}

export interface RadiusFilter {
  center: GeoPoint;
  radiusKm: number;
}

/**
 * Structured filters accepted by an ArticleStore. Every field is optional and
 * supplied fields combine with AND.
 */
export interface ArticlePredicates {
  text?: string;
  category?: string;
  source?: string;
  minScore?: number;
  maxScore?: number;
  boundingBox?: BoundingBox;
  near?: RadiusFilter;
}

export interface ArticleStore {
  query(predicates: ArticlePredicates): Promise<Article[]>;
  findById(id: string): Promise<Article | null>;
}

export interface InteractionStore {
  eventsFor(
    articleId: string,
    options?: { since?: Date }
  ): Promise<InteractionEvent[]>;
}

export interface TrendingFactors {
  volume: number;
  engagement: number;
  recency: number;
  geo: number;
  relevance: number;
}

export interface TrendingResult {
  article: Article;
  /** Weighted factor sum, 0 – 1. */
  score: number;
  /** `score` scaled to 0 – 100 for presentation. */
  displayScore: number;
  factors: TrendingFactors;
  clusterKey: string;
  computedAt: Date;
}

export type Clock = () => Date;
