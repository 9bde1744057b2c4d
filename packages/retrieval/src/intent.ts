import type { Logger } from "@geonews/logger";

import { UpstreamUnavailableError, describeError } from "./errors.js";
import {
  INTENT_KINDS,
  type EntityRole,
  type ExtractedEntity,
  type IntentResolution,
  type IntentSignals,
  type QueryIntent
} from "./intent-types.js";
import type { AnalyzedEntity, EntityAnalyzer } from "./nlp/analyzer.js";
import { pickIntent } from "./strategy.js";
import type { GeoPoint } from "./types.js";
import {
  findMentions,
  getDefaultVocabulary,
  hasCue,
  matchCategory,
  matchPlace,
  matchSource,
  type Vocabulary
} from "./vocabulary.js";

/** Confidence reported whenever the keyword heuristic answered. */
export const FALLBACK_CONFIDENCE = 0.5;

const MIN_SALIENCE = 0.1;

/** Per-intent signal strengths before scaling by the path's confidence. */
const SIGNAL_WEIGHTS = {
  category: 0.9,
  source: 0.85,
  nearbyPlace: 0.6,
  proximityBoost: 0.3,
  nearbyCoordinateOnly: 0.8,
  trending: 0.85,
  score: 0.7,
  search: 0.3
} as const;

const ROLE_BY_TYPE: Record<string, EntityRole> = {
  LOCATION: "location",
  LOC: "location",
  GPE: "location",
  ADDRESS: "location",
  ORGANIZATION: "organization",
  ORG: "organization",
  PERSON: "person",
  PER: "person"
};

export function roleForType(type: string): EntityRole {
  return ROLE_BY_TYPE[type.toUpperCase()] ?? "topic";
}

export type IntentResolverOptions = {
  analyzer: EntityAnalyzer;
  logger: Logger;
  vocabulary?: Vocabulary;
  /** Upper bound on the capability call, whatever the analyzer does. */
  timeoutMs?: number;
  onResolved?: (resolution: IntentResolution) => void;
};

const DEFAULT_TIMEOUT_MS = 2_000;

export class IntentResolver {
  private readonly analyzer: EntityAnalyzer;
  private readonly logger: Logger;
  private readonly vocabulary: Vocabulary;
  private readonly timeoutMs: number;
  private readonly onResolved?: (resolution: IntentResolution) => void;

  constructor(options: IntentResolverOptions) {
    this.analyzer = options.analyzer;
    this.logger = options.logger;
    this.vocabulary = options.vocabulary ?? getDefaultVocabulary();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.onResolved = options.onResolved;
  }

  /**
   * Resolves free text into an intent. The analyzed path is tried first; any
   * failure of the capability yields the keyword heuristic instead.
   */
  async resolve(text: string, coordinate?: GeoPoint): Promise<IntentResolution> {
    let resolution: IntentResolution;
    try {
      const analysis = await this.analyzeWithDeadline(text);
      const entities = this.fromAnalysis(text, analysis.entities);
      resolution = {
        kind: "analyzed",
        intent: this.buildIntent(text, entities, coordinate, analysis.confidence)
      };
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn(
        { analyzer: this.analyzer.name, reason },
        "NLP analysis unavailable, using keyword heuristic"
      );
      resolution = {
        kind: "fallback",
        intent: this.buildIntent(
          text,
          this.fromVocabulary(text),
          coordinate,
          FALLBACK_CONFIDENCE
        ),
        reason
      };
    }

    this.onResolved?.(resolution);
    return resolution;
  }

  async resolveQuery(text: string, coordinate?: GeoPoint): Promise<QueryIntent> {
    return (await this.resolve(text, coordinate)).intent;
  }

  private async analyzeWithDeadline(text: string) {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const error = new UpstreamUnavailableError(
          `NLP analysis exceeded ${this.timeoutMs}ms`
        );
        controller.abort(error);
        reject(error);
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.analyzer.analyze(text, { signal: controller.signal }),
        deadline
      ]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private fromVocabulary(text: string): ExtractedEntity[] {
    return findMentions(text, this.vocabulary).map((mention) => ({
      text: mention.text,
      role: mention.role,
      canonical: mention.canonical,
      ...(mention.location ? { location: mention.location } : {})
    }));
  }

  private fromAnalysis(text: string, analyzed: AnalyzedEntity[]): ExtractedEntity[] {
    const entities: ExtractedEntity[] = [];
    const seen = new Set<string>();

    for (const item of analyzed) {
      if (item.salience !== undefined && item.salience <= MIN_SALIENCE) {
        continue;
      }
      const key = item.text.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      entities.push(this.enrich({ text: item.text, role: roleForType(item.type) }));
    }

    // Category words the capability did not surface still count as topics.
    for (const mention of findMentions(text, this.vocabulary)) {
      if (mention.role === "topic" && !seen.has(mention.text.toLowerCase())) {
        seen.add(mention.text.toLowerCase());
        entities.push({ text: mention.text, role: "topic", canonical: mention.canonical });
      }
    }

    return entities;
  }

  private enrich(entity: ExtractedEntity): ExtractedEntity {
    switch (entity.role) {
      case "location": {
        const place = matchPlace(entity.text, this.vocabulary);
        return place
          ? {
              ...entity,
              canonical: place.canonical,
              ...(place.location ? { location: place.location } : {})
            }
          : entity;
      }
      case "organization": {
        const source = matchSource(entity.text, this.vocabulary);
        return source ? { ...entity, canonical: source } : entity;
      }
      case "topic": {
        const category = matchCategory(entity.text, this.vocabulary);
        return category ? { ...entity, canonical: category } : entity;
      }
      case "person":
        return entity;
    }
  }

  private buildIntent(
    text: string,
    entities: ExtractedEntity[],
    coordinate: GeoPoint | undefined,
    confidence: number
  ): QueryIntent {
    const signals = this.signalsFor(text, entities, coordinate);
    const scaled: IntentSignals = {};
    for (const kind of INTENT_KINDS) {
      const value = signals[kind];
      if (value !== undefined) {
        scaled[kind] = value * confidence;
      }
    }

    return {
      kind: pickIntent(scaled),
      confidence,
      entities,
      signals: scaled
    };
  }

  private signalsFor(
    text: string,
    entities: ExtractedEntity[],
    coordinate: GeoPoint | undefined
  ): IntentSignals {
    const signals: IntentSignals = { search: SIGNAL_WEIGHTS.search };
    const cues = this.vocabulary.cues;
    const proximity = hasCue(text, cues.proximity);

    if (entities.some((entity) => entity.role === "topic" && entity.canonical)) {
      signals.category = SIGNAL_WEIGHTS.category;
    }
    if (entities.some((entity) => entity.role === "organization" && entity.canonical)) {
      signals.source = SIGNAL_WEIGHTS.source;
    }

    const hasPlace = entities.some((entity) => entity.role === "location");
    if (hasPlace) {
      signals.nearby = Math.min(
        1,
        SIGNAL_WEIGHTS.nearbyPlace + (proximity ? SIGNAL_WEIGHTS.proximityBoost : 0)
      );
    } else if (proximity && coordinate) {
      signals.nearby = SIGNAL_WEIGHTS.nearbyCoordinateOnly;
    }

    if (hasCue(text, cues.trending)) {
      signals.trending = SIGNAL_WEIGHTS.trending;
    }
    if (hasCue(text, cues.topScore)) {
      signals.score = SIGNAL_WEIGHTS.score;
    }

    return signals;
  }
}
