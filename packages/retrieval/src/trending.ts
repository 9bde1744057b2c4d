import { distanceKm } from "./geo.js";
import type {
  Article,
  GeoPoint,
  InteractionEvent,
  InteractionKind,
  TrendingFactors
} from "./types.js";

export const INTERACTION_WEIGHTS: Record<InteractionKind, number> = {
  view: 1,
  click: 2,
  share: 3,
  bookmark: 2,
  comment: 2
};

/** Share of each factor in the final score; sums to 1. */
export const FACTOR_WEIGHTS: TrendingFactors = {
  volume: 0.25,
  engagement: 0.3,
  recency: 0.25,
  geo: 0.15,
  relevance: 0.05
};

const DECAY_SECONDS = 86_400;
const VOLUME_SATURATION = 10;
const ENGAGEMENT_SATURATION = 20;
const GEO_HALF_DISTANCE_KM = 100;
/** Geo factor for articles with no coordinate. */
export const NEUTRAL_GEO = 0.5;

export type TrendingScore = {
  score: number;
  displayScore: number;
  factors: TrendingFactors;
};

/** e^(−Δt/86400) with Δt in seconds; events stamped in the future count as fresh. */
export function recencyDecay(occurredAt: Date, now: Date): number {
  const elapsedSeconds = Math.max(0, (now.getTime() - occurredAt.getTime()) / 1000);
  return Math.exp(-elapsedSeconds / DECAY_SECONDS);
}

/** 1 at zero distance, 0.5 at 100 km. */
export function geoRelevance(origin: GeoPoint, article: Article): number {
  if (!article.location) {
    return NEUTRAL_GEO;
  }
  return 1 / (1 + distanceKm(origin, article.location) / GEO_HALF_DISTANCE_KM);
}

export function combineFactors(factors: TrendingFactors): number {
  return (
    factors.volume * FACTOR_WEIGHTS.volume +
    factors.engagement * FACTOR_WEIGHTS.engagement +
    factors.recency * FACTOR_WEIGHTS.recency +
    factors.geo * FACTOR_WEIGHTS.geo +
    factors.relevance * FACTOR_WEIGHTS.relevance
  );
}

export type TrendingScorerOptions = {
  /** Events older than this are ignored. */
  interactionWindowHours?: number;
};

/**
 * Multi-factor popularity score. Recency decay is applied to every event
 * and summed, so sustained engagement outweighs a single late burst.
 */
export class TrendingScorer {
  readonly interactionWindowMs: number;

  constructor(options: TrendingScorerOptions = {}) {
    this.interactionWindowMs = (options.interactionWindowHours ?? 48) * 3_600_000;
  }

  windowStart(now: Date): Date {
    return new Date(now.getTime() - this.interactionWindowMs);
  }

  score(
    article: Article,
    events: InteractionEvent[],
    origin: GeoPoint,
    now: Date
  ): TrendingScore {
    const cutoff = this.windowStart(now).getTime();

    let counted = 0;
    let decayedCount = 0;
    let decayedWeighted = 0;
    for (const event of events) {
      if (event.articleId !== article.id || event.occurredAt.getTime() < cutoff) {
        continue;
      }
      const decay = recencyDecay(event.occurredAt, now);
      counted++;
      decayedCount += decay;
      decayedWeighted += INTERACTION_WEIGHTS[event.kind] * decay;
    }

    const factors: TrendingFactors = {
      volume: Math.min(decayedCount / VOLUME_SATURATION, 1),
      engagement: Math.min(decayedWeighted / ENGAGEMENT_SATURATION, 1),
      recency: counted > 0 ? decayedCount / counted : 0,
      geo: geoRelevance(origin, article),
      relevance: article.relevanceScore
    };

    const score = combineFactors(factors);
    return { score, displayScore: score * 100, factors };
  }
}
