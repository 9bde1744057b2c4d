import { describe, expect, it } from "vitest";
import {
  CircuitState,
  DisabledEntityAnalyzer,
  HttpEntityAnalyzer,
  UpstreamUnavailableError
} from "@geonews/retrieval";
import { createMemoryRepositories } from "@geonews/store";

import { buildServer, nlpStatus } from "../apps/api/src/app.js";
import { createSampleEngine, logger, seedSampleData, settings } from "./helpers/news-app.js";

async function createServer() {
  const repositories = createMemoryRepositories();
  await seedSampleData(repositories);
  const analyzer = new DisabledEntityAnalyzer();
  return buildServer({
    logger,
    repositories,
    storeKind: "memory",
    engine: createSampleEngine(repositories, analyzer),
    analyzer,
    retrieval: settings
  });
}

describe("health and metrics", () => {
  it("reports the store and NLP checks", async () => {
    const server = await createServer();

    const response = await server.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    const payload = response.json();
    expect(payload.status).toBe("ok");
    expect(payload.service).toBe("api");
    expect(payload.checks).toEqual({ store: "up", storeKind: "memory", nlp: "disabled" });
    await server.close();
  });

  it("exposes request counters in the Prometheus format", async () => {
    const server = await createServer();
    await server.inject({ method: "GET", url: "/api/v1/news/score" });

    const response = await server.inject({ method: "GET", url: "/metrics" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toContain("text/plain");
    expect(response.body).toContain("# TYPE geonews_api_http_requests_total counter");
    expect(response.body).toContain(
      'geonews_api_http_requests_total{method="GET",route="/api/v1/news/score",status_code="200"}'
    );
    await server.close();
  });
});

describe("nlpStatus", () => {
  it("reports degraded once the circuit opens", async () => {
    const analyzer = new HttpEntityAnalyzer({
      endpoint: "http://nlp.test/analyze",
      fetchImpl: async () => new Response("{}", { status: 503 }),
      retry: { maxRetries: 0 },
      circuitBreaker: { failureThreshold: 1 }
    });

    expect(nlpStatus(analyzer)).toBe("up");
    await expect(analyzer.analyze("anything")).rejects.toBeInstanceOf(UpstreamUnavailableError);
    expect(analyzer.getCircuitState()).toBe(CircuitState.OPEN);
    expect(nlpStatus(analyzer)).toBe("degraded");
  });
});
