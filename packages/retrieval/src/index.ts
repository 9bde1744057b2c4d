export * from "./types.js";
export * from "./errors.js";
export * from "./geo.js";
export * from "./intent-types.js";
export * from "./intent.js";
export * from "./vocabulary.js";
export * from "./predicates.js";
export * from "./strategy.js";
export * from "./ranker.js";
export * from "./trending.js";
export * from "./result-cache.js";
export * from "./summarize.js";
export * from "./engine.js";
export * from "./nlp/analyzer.js";
export * from "./nlp/circuit-breaker.js";
