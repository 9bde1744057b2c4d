import { describe, expect, it } from "vitest";

import { loadConfig } from "../packages/config/src/load-config.js";

describe("loadConfig", () => {
  it("merges environment variables with defaults", () => {
    const config = loadConfig({
      env: {
        DATABASE_URL: "postgres://example.com/geonews",
        MONITORING_ENABLED: "false",
        MONITORING_METRICS_PORT: "9400",
        MONITORING_METRICS_HOST: "127.0.0.1",
        RETRIEVAL_DEFAULT_LIMIT: "8"
      }
    });

    expect(config.database.url).toBe("postgres://example.com/geonews");
    expect(config.monitoring.enabled).toBe(false);
    expect(config.monitoring.metricsPort).toBe(9400);
    expect(config.monitoring.metricsHost).toBe("127.0.0.1");
    expect(config.retrieval.defaultLimit).toBe(8);
    expect(config.retrieval.maxLimit).toBe(50);
    expect(config.trending.cacheTtlMs).toBe(300_000);
    expect(config.trending.interactionWindowHours).toBe(48);
    expect(config.nlp.provider).toBe("disabled");
    expect(config.seed.dataPath).toBe("data/news_data.json");
  });

  it("treats an empty database URL as unset", () => {
    expect(loadConfig({ env: { DATABASE_URL: "" } }).database.url).toBeUndefined();
  });

  it("requires an endpoint for the http NLP provider", () => {
    expect(() => loadConfig({ env: { NLP_PROVIDER: "http" } })).toThrow(
      "Invalid configuration: nlp.endpoint: NLP endpoint is required when the http provider is selected"
    );
  });

  it("rejects a default limit above the maximum", () => {
    expect(() =>
      loadConfig({ env: { RETRIEVAL_DEFAULT_LIMIT: "20", RETRIEVAL_MAX_LIMIT: "10" } })
    ).toThrow("retrieval.defaultLimit: Default limit cannot exceed the maximum limit");
  });
});
