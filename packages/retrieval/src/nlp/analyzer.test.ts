import { describe, expect, it, vi } from "vitest";

import { UpstreamUnavailableError } from "../errors.js";
import {
  DisabledEntityAnalyzer,
  HttpEntityAnalyzer,
  createEntityAnalyzer
} from "./analyzer.js";
import { CircuitState } from "./circuit-breaker.js";

const endpoint = "http://nlp.test/analyze";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

describe("HttpEntityAnalyzer", () => {
  it("posts the text and validates the response", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        entities: [{ text: "Mumbai", type: "LOCATION", salience: 0.6 }],
        confidence: 0.8
      })
    );
    const analyzer = new HttpEntityAnalyzer({ endpoint, apiKey: "test-secret", fetchImpl });

    const analysis = await analyzer.analyze("news in Mumbai");

    expect(analysis).toEqual({
      entities: [{ text: "Mumbai", type: "LOCATION", salience: 0.6 }],
      confidence: 0.8
    });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(endpoint);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret"
    });
    expect(init?.body).toBe(JSON.stringify({ text: "news in Mumbai" }));
  });

  it("wraps HTTP errors as UpstreamUnavailableError", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({}, 500));
    const analyzer = new HttpEntityAnalyzer({
      endpoint,
      fetchImpl,
      retry: { maxRetries: 0 }
    });

    const failure = analyzer.analyze("anything");

    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toThrow("Error: NLP API returned 500");
  });

  it("rejects responses that do not match the contract", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ entities: "none" }));
    const analyzer = new HttpEntityAnalyzer({
      endpoint,
      fetchImpl,
      retry: { maxRetries: 0 }
    });

    await expect(analyzer.analyze("anything")).rejects.toThrow(
      "Error: Invalid NLP response format"
    );
  });

  it("retries a failed request once", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValueOnce(new Error("connection reset"))
      .mockResolvedValueOnce(jsonResponse({ entities: [], confidence: 0.4 }));
    const analyzer = new HttpEntityAnalyzer({
      endpoint,
      fetchImpl,
      retry: { maxRetries: 1, initialDelayMs: 1 }
    });

    await expect(analyzer.analyze("anything")).resolves.toEqual({
      entities: [],
      confidence: 0.4
    });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("stops calling the endpoint once the circuit opens", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({}, 503));
    const analyzer = new HttpEntityAnalyzer({
      endpoint,
      fetchImpl,
      retry: { maxRetries: 0 },
      circuitBreaker: { failureThreshold: 2 }
    });

    await expect(analyzer.analyze("one")).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(analyzer.analyze("two")).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(analyzer.analyze("three")).rejects.toThrow("NLP circuit breaker is open");

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(analyzer.getCircuitState()).toBe(CircuitState.OPEN);
  });

  it("aborts requests that exceed the timeout", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        })
    );
    const analyzer = new HttpEntityAnalyzer({
      endpoint,
      fetchImpl,
      timeoutMs: 10,
      retry: { maxRetries: 0 }
    });

    await expect(analyzer.analyze("slow")).rejects.toThrow(
      "NLP request timed out after 10ms"
    );
  });
});

describe("createEntityAnalyzer", () => {
  const base = {
    timeoutMs: 2_000,
    maxRetries: 1,
    circuitBreaker: { failureThreshold: 5, successThreshold: 2, resetTimeoutMs: 30_000 }
  };

  it("builds the HTTP analyzer when an endpoint is configured", () => {
    expect(createEntityAnalyzer({ ...base, provider: "http", endpoint }).name).toBe("http");
  });

  it("falls back to the disabled analyzer otherwise", async () => {
    const analyzer = createEntityAnalyzer({ ...base, provider: "disabled" });

    expect(analyzer).toBeInstanceOf(DisabledEntityAnalyzer);
    await expect(analyzer.analyze("anything")).rejects.toThrow(
      "NLP capability is not configured"
    );
  });
});
