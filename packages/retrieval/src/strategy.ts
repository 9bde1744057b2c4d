import type { IntentKind, IntentSignals, QueryIntent } from "./intent-types.js";
import { hasPredicates } from "./predicates.js";
import type { ArticlePredicates, GeoPoint } from "./types.js";

export type RetrievalStrategy =
  | { kind: "category"; category: string }
  | { kind: "source"; source: string }
  | { kind: "search"; text: string }
  | { kind: "score"; minScore: number }
  | { kind: "nearby"; center: GeoPoint; radiusKm: number }
  | { kind: "trending"; center: GeoPoint }
  | { kind: "flexible"; predicates: ArticlePredicates };

export type StrategyKind = RetrievalStrategy["kind"];

/** Strategies served by ArticleStore + RelevanceRanker. */
export type RankedStrategy = Exclude<RetrievalStrategy, { kind: "trending" }>;

/** Equal signals resolve in this order. */
export const INTENT_PRECEDENCE = [
  "category",
  "source",
  "nearby",
  "trending",
  "score",
  "search",
  "flexible"
] as const satisfies readonly IntentKind[];

export function pickIntent(signals: IntentSignals): IntentKind {
  let best: IntentKind = "search";
  let bestSignal = -Infinity;
  for (const kind of INTENT_PRECEDENCE) {
    const signal = signals[kind];
    if (signal !== undefined && signal > bestSignal) {
      best = kind;
      bestSignal = signal;
    }
  }
  return best;
}

/** Caller-supplied structured parameters; any of them bypasses the resolver. */
export type ExplicitFilters = {
  category?: string;
  source?: string;
  minScore?: number;
  maxScore?: number;
};

export type SelectionContext = {
  text: string;
  coordinate?: GeoPoint;
  radiusKm: number;
  scoreThreshold: number;
};

export function hasExplicitFilters(filters: ExplicitFilters | undefined): filters is ExplicitFilters {
  return filters !== undefined && hasPredicates(filters);
}

/**
 * Flexible strategy combining every supplied predicate. The text and the
 * coordinate + radius are included when present.
 */
export function flexibleStrategy(
  filters: ExplicitFilters,
  context: Partial<SelectionContext> = {}
): Extract<RetrievalStrategy, { kind: "flexible" }> {
  const predicates: ArticlePredicates = { ...filters };
  const text = context.text?.trim();
  if (text) {
    predicates.text = text;
  }
  if (context.coordinate && context.radiusKm !== undefined) {
    predicates.near = { center: context.coordinate, radiusKm: context.radiusKm };
  }
  return { kind: "flexible", predicates };
}

function searchFallback(context: SelectionContext): RetrievalStrategy {
  return { kind: "search", text: context.text };
}

function entityCanonical(intent: QueryIntent, role: "topic" | "organization") {
  return intent.entities.find((entity) => entity.role === role && entity.canonical)
    ?.canonical;
}

function placeCoordinate(intent: QueryIntent): GeoPoint | undefined {
  return intent.entities.find((entity) => entity.role === "location" && entity.location)
    ?.location;
}

/**
 * Maps a resolved intent to a retrieval strategy. Intents missing what they
 * need (no category entity, no coordinate) degrade to a text search.
 */
export function selectStrategy(
  intent: QueryIntent,
  context: SelectionContext
): RetrievalStrategy {
  switch (intent.kind) {
    case "category": {
      const category = entityCanonical(intent, "topic");
      return category ? { kind: "category", category } : searchFallback(context);
    }
    case "source": {
      const source = entityCanonical(intent, "organization");
      return source ? { kind: "source", source } : searchFallback(context);
    }
    case "search":
      return searchFallback(context);
    case "score":
      return { kind: "score", minScore: context.scoreThreshold };
    case "nearby": {
      const center = context.coordinate ?? placeCoordinate(intent);
      return center
        ? { kind: "nearby", center, radiusKm: context.radiusKm }
        : searchFallback(context);
    }
    case "trending": {
      const center = context.coordinate ?? placeCoordinate(intent);
      return center ? { kind: "trending", center } : searchFallback(context);
    }
    case "flexible":
      return flexibleStrategy({}, context);
    default:
      return assertNever(intent.kind);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
