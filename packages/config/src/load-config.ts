import { config as loadDotenv } from "dotenv";
import type { ZodIssue } from "zod";

import { configSchema, type AppConfig } from "./schema.js";

let cachedConfig: AppConfig | null = null;

function coerceBoolean(value: string | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  return undefined;
}

/**
 * Reads configuration from the environment. Only the process environment is
 * cached; an explicit `env` is always parsed fresh so tests stay isolated.
 */
export function loadConfig(options: { env?: NodeJS.ProcessEnv } = {}): AppConfig {
  if (!options.env && cachedConfig) {
    return cachedConfig;
  }

  if (!options.env) {
    loadDotenv();
  }

  const env = options.env ?? process.env;

  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT
    },
    database: {
      url: env.DATABASE_URL || undefined,
      poolMax: env.DATABASE_POOL_MAX
    },
    nlp: {
      provider: env.NLP_PROVIDER,
      endpoint: env.NLP_ENDPOINT || undefined,
      apiKey: env.NLP_API_KEY || undefined,
      timeoutMs: env.NLP_TIMEOUT_MS,
      maxRetries: env.NLP_MAX_RETRIES,
      circuitBreaker: {
        failureThreshold: env.NLP_CIRCUIT_BREAKER_FAILURE_THRESHOLD,
        successThreshold: env.NLP_CIRCUIT_BREAKER_SUCCESS_THRESHOLD,
        resetTimeoutMs: env.NLP_CIRCUIT_BREAKER_RESET_TIMEOUT_MS
      }
    },
    retrieval: {
      defaultLimit: env.RETRIEVAL_DEFAULT_LIMIT,
      maxLimit: env.RETRIEVAL_MAX_LIMIT,
      defaultRadiusKm: env.RETRIEVAL_DEFAULT_RADIUS_KM,
      scoreThreshold: env.RETRIEVAL_SCORE_THRESHOLD
    },
    trending: {
      cacheTtlMs: env.TRENDING_CACHE_TTL_MS,
      sweepIntervalMs: env.TRENDING_SWEEP_INTERVAL_MS,
      interactionWindowHours: env.TRENDING_INTERACTION_WINDOW_HOURS
    },
    seed: {
      enabled: coerceBoolean(env.SEED_ENABLED),
      dataPath: env.SEED_DATA_PATH,
      simulateInteractions: coerceBoolean(env.SEED_SIMULATE_INTERACTIONS)
    },
    enrichment: {
      concurrency: env.ENRICHMENT_CONCURRENCY,
      batchSize: env.ENRICHMENT_BATCH_SIZE,
      intervalMs: env.ENRICHMENT_INTERVAL_MS
    },
    monitoring: {
      enabled: coerceBoolean(env.MONITORING_ENABLED),
      metricsPort: env.MONITORING_METRICS_PORT,
      metricsHost: env.MONITORING_METRICS_HOST
    }
  });

  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue: ZodIssue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${formattedErrors}`);
  }

  if (!options.env) {
    cachedConfig = result.data;
  }
  return result.data;
}

export function resetConfigCache() {
  cachedConfig = null;
}
