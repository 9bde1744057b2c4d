import type { GeoPoint } from "./types.js";

export const INTENT_KINDS = [
  "category",
  "source",
  "search",
  "score",
  "nearby",
  "trending",
  "flexible"
] as const;

export type IntentKind = (typeof INTENT_KINDS)[number];

export type EntityRole = "location" | "topic" | "organization" | "person";

export interface ExtractedEntity {
  text: string;
  role: EntityRole;
  /** Canonical vocabulary name when the entity matched one (category, source or place). */
  canonical?: string;
  /** Coordinate of a recognised place. */
  location?: GeoPoint;
}

/** Per-intent confidence used by the tie-break. */
export type IntentSignals = Partial<Record<IntentKind, number>>;

export interface QueryIntent {
  kind: IntentKind;
  confidence: number;
  entities: ExtractedEntity[];
  signals: IntentSignals;
}

export type IntentResolution =
  | { kind: "analyzed"; intent: QueryIntent }
  | { kind: "fallback"; intent: QueryIntent; reason: string };
