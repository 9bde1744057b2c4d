import { describe, expect, it } from "vitest";

import type { QueryIntent } from "./intent-types.js";
import {
  flexibleStrategy,
  hasExplicitFilters,
  pickIntent,
  selectStrategy,
  type SelectionContext
} from "./strategy.js";

const context: SelectionContext = {
  text: "startup funding",
  radiusKm: 10,
  scoreThreshold: 0.7
};

function intent(partial: Partial<QueryIntent> & Pick<QueryIntent, "kind">): QueryIntent {
  return { confidence: 0.5, entities: [], signals: {}, ...partial };
}

describe("pickIntent", () => {
  it("chooses the highest signal", () => {
    expect(pickIntent({ search: 0.3, score: 0.7, nearby: 0.6 })).toBe("score");
  });

  it("breaks ties by the fixed precedence", () => {
    expect(pickIntent({ source: 0.5, category: 0.5 })).toBe("category");
    expect(pickIntent({ trending: 0.4, nearby: 0.4, score: 0.4 })).toBe("nearby");
    expect(pickIntent({ search: 0.2, score: 0.2 })).toBe("score");
  });

  it("defaults to search with no signals", () => {
    expect(pickIntent({})).toBe("search");
  });
});

describe("selectStrategy", () => {
  it("uses the canonical category of the topic entity", () => {
    const strategy = selectStrategy(
      intent({
        kind: "category",
        entities: [{ text: "Tech", role: "topic", canonical: "technology" }]
      }),
      context
    );
    expect(strategy).toEqual({ kind: "category", category: "technology" });
  });

  it("degrades category without a recognised entity to search", () => {
    const strategy = selectStrategy(intent({ kind: "category" }), context);
    expect(strategy).toEqual({ kind: "search", text: "startup funding" });
  });

  it("degrades source without an organization entity to search", () => {
    const strategy = selectStrategy(
      intent({ kind: "source", entities: [{ text: "Acme", role: "organization" }] }),
      context
    );
    expect(strategy).toEqual({ kind: "search", text: "startup funding" });
  });

  it("uses the configured threshold for score", () => {
    expect(selectStrategy(intent({ kind: "score" }), context)).toEqual({
      kind: "score",
      minScore: 0.7
    });
  });

  it("prefers the user coordinate for nearby", () => {
    const coordinate = { latitude: 12.9716, longitude: 77.5946 };
    const strategy = selectStrategy(
      intent({
        kind: "nearby",
        entities: [
          {
            text: "Mumbai",
            role: "location",
            canonical: "Mumbai",
            location: { latitude: 19.076, longitude: 72.8777 }
          }
        ]
      }),
      { ...context, coordinate }
    );
    expect(strategy).toEqual({ kind: "nearby", center: coordinate, radiusKm: 10 });
  });

  it("uses a recognised place when no coordinate is given", () => {
    const strategy = selectStrategy(
      intent({
        kind: "trending",
        entities: [
          {
            text: "Pune",
            role: "location",
            canonical: "Pune",
            location: { latitude: 18.5204, longitude: 73.8567 }
          }
        ]
      }),
      context
    );
    expect(strategy).toEqual({
      kind: "trending",
      center: { latitude: 18.5204, longitude: 73.8567 }
    });
  });

  it("degrades nearby and trending with no location at all to search", () => {
    expect(selectStrategy(intent({ kind: "nearby" }), context)).toEqual({
      kind: "search",
      text: "startup funding"
    });
    expect(selectStrategy(intent({ kind: "trending" }), context)).toEqual({
      kind: "search",
      text: "startup funding"
    });
  });
});

describe("flexibleStrategy", () => {
  it("combines explicit filters with text and coordinate", () => {
    const coordinate = { latitude: 19.076, longitude: 72.8777 };
    expect(
      flexibleStrategy(
        { category: "business", minScore: 0.5 },
        { text: "  funding ", coordinate, radiusKm: 25 }
      )
    ).toEqual({
      kind: "flexible",
      predicates: {
        category: "business",
        minScore: 0.5,
        text: "funding",
        near: { center: coordinate, radiusKm: 25 }
      }
    });
  });

  it("omits blank text", () => {
    expect(flexibleStrategy({ source: "Reuters" }, { text: "   " })).toEqual({
      kind: "flexible",
      predicates: { source: "Reuters" }
    });
  });
});

describe("hasExplicitFilters", () => {
  it("ignores undefined fields", () => {
    expect(hasExplicitFilters(undefined)).toBe(false);
    expect(hasExplicitFilters({ category: undefined })).toBe(false);
    expect(hasExplicitFilters({ maxScore: 0.9 })).toBe(true);
  });
});
