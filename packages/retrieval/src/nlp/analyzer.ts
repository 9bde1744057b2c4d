import { z } from "zod";
import { createLogger } from "@geonews/logger";

import { UpstreamUnavailableError, describeError } from "../errors.js";
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  type CircuitBreakerOptions
} from "./circuit-breaker.js";

const logger = createLogger({ name: "nlp" });

export type AnalyzedEntity = {
  text: string;
  /** Capability-specific type label, e.g. LOCATION, ORGANIZATION, PERSON. */
  type: string;
  salience?: number;
};

export type EntityAnalysis = {
  entities: AnalyzedEntity[];
  confidence: number;
};

export type AnalyzeOptions = {
  signal?: AbortSignal;
};

/** External entity/intent extraction capability. */
export interface EntityAnalyzer {
  readonly name: string;
  analyze(text: string, options?: AnalyzeOptions): Promise<EntityAnalysis>;
}

const analysisResponseSchema = z.object({
  entities: z.array(
    z.object({
      text: z.string().min(1),
      type: z.string().default("OTHER"),
      salience: z.number().min(0).max(1).optional()
    })
  ),
  confidence: z.number().min(0).max(1)
});

interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 1,
  initialDelayMs: 100,
  maxDelayMs: 1_000,
  backoffMultiplier: 2
};

async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
  signal: AbortSignal,
  attempt = 0
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (attempt >= options.maxRetries || signal.aborted) {
      throw error;
    }

    const delay = Math.min(
      options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt),
      options.maxDelayMs
    );

    logger.debug(
      { attempt: attempt + 1, maxRetries: options.maxRetries, delayMs: delay },
      "Retrying NLP request after failure"
    );

    await new Promise((resolve) => setTimeout(resolve, delay));
    return retryWithBackoff(fn, options, signal, attempt + 1);
  }
}

export type HttpEntityAnalyzerOptions = {
  endpoint: string;
  apiKey?: string;
  timeoutMs?: number;
  retry?: Partial<RetryOptions>;
  circuitBreaker?: Partial<CircuitBreakerOptions>;
  fetchImpl?: typeof fetch;
};

/**
 * Calls a JSON-over-HTTP entity extraction service:
 * `POST { text }` → `{ entities: [{ text, type, salience? }], confidence }`.
 */
export class HttpEntityAnalyzer implements EntityAnalyzer {
  readonly name = "http";
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly retryOptions: RetryOptions;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEntityAnalyzerOptions) {
    this.endpoint = options.endpoint;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 2_000;
    this.retryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options.retry };
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.circuitBreaker = new CircuitBreaker({
      ...options.circuitBreaker,
      onStateChange: (state) => {
        logger.info({ state, endpoint: this.endpoint }, "NLP circuit breaker state changed");
        options.circuitBreaker?.onStateChange?.(state);
      }
    });
  }

  getCircuitState() {
    return this.circuitBreaker.getState();
  }

  async analyze(text: string, options: AnalyzeOptions = {}): Promise<EntityAnalysis> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort(
        new UpstreamUnavailableError(`NLP request timed out after ${this.timeoutMs}ms`)
      );
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      return await this.circuitBreaker.execute(() =>
        retryWithBackoff(
          () => this.request(text, controller.signal),
          this.retryOptions,
          controller.signal
        )
      );
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        throw error;
      }
      if (error instanceof CircuitBreakerOpenError) {
        throw new UpstreamUnavailableError(error.message, { cause: error });
      }
      if (controller.signal.aborted && controller.signal.reason instanceof UpstreamUnavailableError) {
        throw controller.signal.reason;
      }
      throw new UpstreamUnavailableError(describeError(error), { cause: error });
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async request(text: string, signal: AbortSignal): Promise<EntityAnalysis> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify({ text }),
      signal
    });

    if (!response.ok) {
      throw new Error(`NLP API returned ${response.status}`);
    }

    const parsed = analysisResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Invalid NLP response format");
    }
    return parsed.data;
  }
}

/** Stand-in used when no NLP endpoint or credentials are configured. */
export class DisabledEntityAnalyzer implements EntityAnalyzer {
  readonly name = "disabled";

  async analyze(): Promise<EntityAnalysis> {
    throw new UpstreamUnavailableError("NLP capability is not configured");
  }
}

export type EntityAnalyzerConfig = {
  provider: "http" | "disabled";
  endpoint?: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  circuitBreaker: {
    failureThreshold: number;
    successThreshold: number;
    resetTimeoutMs: number;
  };
};

export function createEntityAnalyzer(config: EntityAnalyzerConfig): EntityAnalyzer {
  if (config.provider === "http" && config.endpoint) {
    logger.info(
      {
        endpoint: config.endpoint,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
        circuitBreaker: config.circuitBreaker
      },
      "Using HTTP NLP provider with circuit breaker and retry"
    );
    return new HttpEntityAnalyzer({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      retry: { maxRetries: config.maxRetries },
      circuitBreaker: config.circuitBreaker
    });
  }

  logger.info("NLP provider disabled, queries use the keyword heuristic");
  return new DisabledEntityAnalyzer();
}
