import { v4 as uuidv4 } from "uuid";
import type { Article, GeoPoint, InteractionEvent, InteractionKind } from "@geonews/retrieval";

const KIND_WEIGHTS: Array<[InteractionKind, number]> = [
  ["view", 0.3],
  ["click", 0.4],
  ["share", 0.2],
  ["bookmark", 0.08],
  ["comment", 0.02]
];

// Hours before `now`; recent activity dominates.
const AGE_WEIGHTS: Array<[number, number]> = [
  [1, 0.3],
  [2, 0.25],
  [4, 0.2],
  [8, 0.15],
  [12, 0.08],
  [24, 0.02]
];

const USER_SPREAD_DEGREES = 0.5;
const MAX_EXTRA_EVENTS = 5;

export type SimulationOptions = {
  /** Uniform [0, 1) source; Math.random by default. */
  random?: () => number;
  now?: Date;
  userCount?: number;
  createId?: () => string;
};

export function pickWeighted<T>(choices: Array<[T, number]>, random: () => number): T {
  const total = choices.reduce((sum, [, weight]) => sum + weight, 0);
  let threshold = random() * total;
  for (const [value, weight] of choices) {
    threshold -= weight;
    if (threshold < 0) {
      return value;
    }
  }
  return choices[choices.length - 1][0];
}

function uniform(min: number, max: number, random: () => number) {
  return min + (max - min) * random();
}

function userLocation(article: Article, random: () => number): GeoPoint {
  if (!article.location) {
    return { latitude: uniform(-90, 90, random), longitude: uniform(-180, 180, random) };
  }
  return {
    latitude: Math.max(
      -90,
      Math.min(90, article.location.latitude + uniform(-USER_SPREAD_DEGREES, USER_SPREAD_DEGREES, random))
    ),
    longitude: Math.max(
      -180,
      Math.min(180, article.location.longitude + uniform(-USER_SPREAD_DEGREES, USER_SPREAD_DEGREES, random))
    )
  };
}

/**
 * Plausible activity per article: more events for more relevant articles,
 * users clustered around the article's location, timestamps skewed recent.
 */
export function simulateInteractions(
  articles: Article[],
  options: SimulationOptions = {}
): InteractionEvent[] {
  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();
  const userCount = options.userCount ?? 100;
  const createId = options.createId ?? uuidv4;

  const events: InteractionEvent[] = [];
  for (const article of articles) {
    const base = Math.max(1, Math.floor(article.relevanceScore * 10));
    const count = base + Math.floor(random() * (MAX_EXTRA_EVENTS + 1));

    for (let index = 0; index < count; index++) {
      const kind = pickWeighted(KIND_WEIGHTS, random);
      const hoursAgo = pickWeighted(AGE_WEIGHTS, random);
      events.push({
        id: createId(),
        articleId: article.id,
        kind,
        occurredAt: new Date(now.getTime() - hoursAgo * 3_600_000),
        userId: `user_${1 + Math.floor(random() * userCount)}`,
        userLocation: userLocation(article, random)
      });
    }
  }
  return events;
}
