import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Article } from "@geonews/retrieval";

const articleRecordSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().min(1),
    description: z.string().default(""),
    url: z.string().url(),
    publication_date: z.string().datetime({ offset: true, local: true }),
    source_name: z.string().min(1),
    category: z.array(z.string().min(1)).default([]),
    relevance_score: z.number().min(0).max(1),
    latitude: z.number().min(-90).max(90).nullish(),
    longitude: z.number().min(-180).max(180).nullish()
  })
  .passthrough();

export const articleRecordsSchema = z.array(articleRecordSchema);

export type ArticleRecord = z.infer<typeof articleRecordSchema>;

const UTC_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** Timestamps without an offset are read as UTC. */
function parsePublicationDate(value: string): Date {
  return new Date(UTC_OFFSET.test(value) ? value : `${value}Z`);
}

export function recordToArticle(record: ArticleRecord): Article {
  const { latitude, longitude } = record;

  return {
    id: record.id,
    title: record.title,
    description: record.description,
    url: record.url,
    publishedAt: parsePublicationDate(record.publication_date),
    sourceName: record.source_name,
    categories: record.category,
    relevanceScore: record.relevance_score,
    location: latitude != null && longitude != null ? { latitude, longitude } : null,
    summary: null
  };
}

/** Reads and validates a JSON array of article records. */
export async function loadArticleRecords(path: string | URL): Promise<ArticleRecord[]> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  const parsed = articleRecordsSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid article data in ${String(path)}: ${details}`);
  }
  return parsed.data;
}
