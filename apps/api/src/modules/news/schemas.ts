import { z } from "zod";
import { INTERACTION_KINDS } from "@geonews/retrieval";

export type RetrievalSettings = {
  defaultLimit: number;
  maxLimit: number;
  defaultRadiusKm: number;
  scoreThreshold: number;
};

const latitudeSchema = z.number().min(-90).max(90);
const longitudeSchema = z.number().min(-180).max(180);
const unitScoreSchema = z.number().min(0).max(1);

/** Query-string number; an absent or blank value stays undefined. */
function queryNumber(schema: z.ZodNumber) {
  return z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === "" ? undefined : Number(value)
    )
    .pipe(schema.optional());
}

function queryText() {
  return z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    });
}

function requiredText(name: string) {
  return z.string().trim().min(1, `${name} is required`);
}

function pairedCoordinate(value: { lat?: number; lon?: number }) {
  return (value.lat === undefined) === (value.lon === undefined);
}

const coordinatePairIssue = {
  message: "lat and lon must be provided together",
  path: ["lat"]
};

function orderedScores(value: { minScore?: number; maxScore?: number }) {
  return (
    value.minScore === undefined ||
    value.maxScore === undefined ||
    value.minScore <= value.maxScore
  );
}

const orderedScoresIssue = {
  message: "minScore cannot exceed maxScore",
  path: ["minScore"]
};

export function createNewsSchemas(settings: RetrievalSettings) {
  const limit = queryNumber(z.number().int().min(1).max(settings.maxLimit)).transform(
    (value) => value ?? settings.defaultLimit
  );
  const radius = queryNumber(z.number().positive()).transform(
    (value) => value ?? settings.defaultRadiusKm
  );

  const categoryQuery = z.object({ category: requiredText("category"), limit });
  const sourceQuery = z.object({ source: requiredText("source"), limit });
  const searchQuery = z.object({ q: requiredText("q"), limit });

  const scoreQuery = z.object({
    minScore: queryNumber(unitScoreSchema).transform(
      (value) => value ?? settings.scoreThreshold
    ),
    limit
  });

  const nearbyQuery = z.object({
    lat: queryNumber(latitudeSchema).pipe(latitudeSchema),
    lon: queryNumber(longitudeSchema).pipe(longitudeSchema),
    radius,
    limit
  });

  const filterQuery = z
    .object({
      q: queryText(),
      category: queryText(),
      source: queryText(),
      minScore: queryNumber(unitScoreSchema),
      maxScore: queryNumber(unitScoreSchema),
      lat: queryNumber(latitudeSchema),
      lon: queryNumber(longitudeSchema),
      radius,
      limit
    })
    .refine(pairedCoordinate, coordinatePairIssue)
    .refine(orderedScores, orderedScoresIssue);

  const trendingQuery = z.object({
    lat: queryNumber(latitudeSchema).pipe(latitudeSchema),
    lon: queryNumber(longitudeSchema).pipe(longitudeSchema),
    limit,
    forceRefresh: z
      .string()
      .optional()
      .transform((value) =>
        value === undefined ? false : ["true", "1", "yes"].includes(value.toLowerCase())
      )
  });

  const queryBody = z
    .object({
      query: z.string().trim().max(500).default(""),
      latitude: latitudeSchema.optional(),
      longitude: longitudeSchema.optional(),
      radius: z.number().positive().default(settings.defaultRadiusKm),
      limit: z.number().int().min(1).max(settings.maxLimit).default(settings.defaultLimit),
      filters: z
        .object({
          category: z.string().trim().min(1).optional(),
          source: z.string().trim().min(1).optional(),
          minScore: unitScoreSchema.optional(),
          maxScore: unitScoreSchema.optional()
        })
        .refine(orderedScores, orderedScoresIssue)
        .optional()
    })
    .refine((value) => (value.latitude === undefined) === (value.longitude === undefined), {
      message: "latitude and longitude must be provided together",
      path: ["latitude"]
    })
    .refine(
      (value) =>
        value.query.length > 0 ||
        Object.values(value.filters ?? {}).some((filter) => filter !== undefined),
      { message: "query is required", path: ["query"] }
    );

  return {
    categoryQuery,
    sourceQuery,
    searchQuery,
    scoreQuery,
    nearbyQuery,
    filterQuery,
    trendingQuery,
    queryBody
  };
}

export type NewsSchemas = ReturnType<typeof createNewsSchemas>;

export const articleIdParamsSchema = z.object({
  id: z.string().trim().min(1)
});

export const interactionBodySchema = z
  .object({
    kind: z.enum(INTERACTION_KINDS),
    userId: z.string().trim().min(1).max(128).optional(),
    latitude: latitudeSchema.optional(),
    longitude: longitudeSchema.optional()
  })
  .refine((value) => (value.latitude === undefined) === (value.longitude === undefined), {
    message: "latitude and longitude must be provided together",
    path: ["latitude"]
  });
