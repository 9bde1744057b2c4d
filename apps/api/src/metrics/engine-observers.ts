import type { RetrievalEngineOptions } from "@geonews/retrieval";

import type { ApiMetrics } from "./registry.js";

type EngineObservers = Required<
  Pick<RetrievalEngineOptions, "onResolved" | "onRetrieved" | "onCacheLookup">
>;

/** Engine hooks feeding the retrieval, intent and trending cache metrics. */
export function createEngineObservers(target: ApiMetrics): EngineObservers {
  return {
    onResolved: (resolution) => {
      target.intentResolutions.inc({
        path: resolution.kind,
        intent: resolution.intent.kind
      });
    },
    onRetrieved: ({ strategy, count, durationMs }) => {
      target.retrievalDuration.observe({ strategy }, durationMs / 1000);
      if (count === 0) {
        target.retrievalZeroResults.inc({ strategy });
      }
    },
    onCacheLookup: (outcome) => {
      target.trendingCacheLookups.inc({ outcome });
    }
  };
}
