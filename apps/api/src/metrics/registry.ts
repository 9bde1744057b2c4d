import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";

const registry = new Registry();

collectDefaultMetrics({
  prefix: "geonews_api_",
  register: registry
});

const httpRequestDuration = new Histogram({
  name: "geonews_api_http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  registers: [registry],
  labelNames: ["method", "route", "status_code"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5]
});

const httpRequestCounter = new Counter({
  name: "geonews_api_http_requests_total",
  help: "Total number of HTTP requests",
  registers: [registry],
  labelNames: ["method", "route", "status_code"]
});

// Retrieval-specific metrics
const retrievalDuration = new Histogram({
  name: "geonews_api_retrieval_duration_seconds",
  help: "Store query plus ranking duration in seconds",
  registers: [registry],
  labelNames: ["strategy"],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1]
});

const retrievalZeroResults = new Counter({
  name: "geonews_api_retrieval_zero_results_total",
  help: "Total number of retrievals returning zero articles",
  registers: [registry],
  labelNames: ["strategy"]
});

const intentResolutions = new Counter({
  name: "geonews_api_intent_resolutions_total",
  help: "Resolved query intents by resolution path",
  registers: [registry],
  labelNames: ["path", "intent"]
});

const trendingCacheLookups = new Counter({
  name: "geonews_api_trending_cache_lookups_total",
  help: "Trending cache lookups by outcome",
  registers: [registry],
  labelNames: ["outcome"]
});

const trendingCacheSweeps = new Counter({
  name: "geonews_api_trending_cache_evictions_total",
  help: "Expired trending entries removed by the sweeper",
  registers: [registry]
});

export const metrics = {
  registry,
  httpRequestDuration,
  httpRequestCounter,
  retrievalDuration,
  retrievalZeroResults,
  intentResolutions,
  trendingCacheLookups,
  trendingCacheSweeps
};

export type ApiMetrics = typeof metrics;
