import { z } from "zod";
import {
  INTERACTION_KINDS,
  type Article,
  type GeoPoint,
  type InteractionEvent
} from "@geonews/retrieval";

// numeric and bigint columns arrive as strings from pg
const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());
const nullableNumeric = numeric.nullable();

const articleRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  url: z.string(),
  published_at: z.coerce.date(),
  source_name: z.string(),
  categories: z.array(z.string()),
  relevance_score: numeric,
  latitude: nullableNumeric,
  longitude: nullableNumeric,
  summary: z.string().nullable()
});

const interactionRowSchema = z.object({
  id: z.string(),
  article_id: z.string(),
  kind: z.enum(INTERACTION_KINDS),
  occurred_at: z.coerce.date(),
  user_id: z.string().nullable(),
  user_latitude: nullableNumeric,
  user_longitude: nullableNumeric
});

const countRowSchema = z.object({ count: numeric });

function point(latitude: number | null, longitude: number | null): GeoPoint | null {
  return latitude === null || longitude === null ? null : { latitude, longitude };
}

export function toArticle(row: unknown): Article {
  const parsed = articleRowSchema.parse(row);
  return {
    id: parsed.id,
    title: parsed.title,
    description: parsed.description,
    url: parsed.url,
    publishedAt: parsed.published_at,
    sourceName: parsed.source_name,
    categories: parsed.categories,
    relevanceScore: parsed.relevance_score,
    location: point(parsed.latitude, parsed.longitude),
    summary: parsed.summary
  };
}

export function toInteraction(row: unknown): InteractionEvent {
  const parsed = interactionRowSchema.parse(row);
  return {
    id: parsed.id,
    articleId: parsed.article_id,
    kind: parsed.kind,
    occurredAt: parsed.occurred_at,
    userId: parsed.user_id,
    userLocation: point(parsed.user_latitude, parsed.user_longitude)
  };
}

export function toCount(rows: unknown[]): number {
  return rows.length > 0 ? countRowSchema.parse(rows[0]).count : 0;
}
