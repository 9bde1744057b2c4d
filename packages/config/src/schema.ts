import { z } from "zod";

const serverSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(3000)
});

const databaseSchema = z.object({
  url: z.string().url().optional(),
  poolMax: z.coerce.number().int().positive().default(5)
});

const monitoringSchema = z.object({
  enabled: z.coerce.boolean().default(true),
  metricsPort: z.coerce.number().int().min(1).max(65535).default(9300),
  metricsHost: z.string().default("0.0.0.0")
});

const nlpSchema = z
  .object({
    provider: z.enum(["http", "disabled"]).default("disabled"),
    endpoint: z.string().url().optional(),
    apiKey: z.string().optional(),
    timeoutMs: z.coerce.number().int().positive().default(2_000),
    maxRetries: z.coerce.number().int().min(0).max(5).default(1),
    circuitBreaker: z.object({
      failureThreshold: z.coerce.number().int().positive().default(5),
      successThreshold: z.coerce.number().int().positive().default(2),
      resetTimeoutMs: z.coerce.number().int().positive().default(30_000)
    })
  })
  .refine((value) => value.provider !== "http" || Boolean(value.endpoint), {
    message: "NLP endpoint is required when the http provider is selected",
    path: ["endpoint"]
  });

const retrievalSchema = z
  .object({
    defaultLimit: z.coerce.number().int().min(1).max(50).default(5),
    maxLimit: z.coerce.number().int().min(1).max(50).default(50),
    defaultRadiusKm: z.coerce.number().positive().default(10),
    scoreThreshold: z.coerce.number().min(0).max(1).default(0.7)
  })
  .refine((value) => value.defaultLimit <= value.maxLimit, {
    message: "Default limit cannot exceed the maximum limit",
    path: ["defaultLimit"]
  });

export const configSchema = z.object({
  nodeEnv: z
    .enum(["development", "test", "production"])
    .default("development"),
  server: serverSchema,
  database: databaseSchema,
  nlp: nlpSchema,
  retrieval: retrievalSchema,
  trending: z.object({
    cacheTtlMs: z.coerce.number().int().positive().default(5 * 60 * 1000), // 5 minutes
    sweepIntervalMs: z.coerce
      .number()
      .int()
      .min(1_000, "Sweep interval must be at least 1 second")
      .default(60_000),
    interactionWindowHours: z.coerce.number().int().positive().default(48)
  }),
  seed: z.object({
    enabled: z.coerce.boolean().default(true),
    dataPath: z.string().default("data/news_data.json"),
    simulateInteractions: z.coerce.boolean().default(true)
  }),
  enrichment: z.object({
    concurrency: z.coerce.number().int().positive().default(5),
    batchSize: z.coerce.number().int().positive().default(20),
    intervalMs: z.coerce
      .number()
      .int()
      .min(1_000, "Enrichment interval must be at least 1 second")
      .default(60_000)
  }),
  monitoring: monitoringSchema
});

export type AppConfig = z.infer<typeof configSchema>;
