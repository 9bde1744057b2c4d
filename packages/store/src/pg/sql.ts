import {
  boundingBox,
  searchTerms,
  type ArticlePredicates
} from "@geonews/retrieval";

export type SqlQuery = {
  text: string;
  values: unknown[];
};

export const ARTICLE_COLUMNS = [
  "id",
  "title",
  "description",
  "url",
  "published_at",
  "source_name",
  "categories",
  "relevance_score",
  "latitude",
  "longitude",
  "summary"
].join(", ");

function escapeLike(term: string) {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Builds a parameterised article query from predicates. A radius is pushed
 * down as its bounding box; callers apply the exact distance test.
 */
export function buildArticleQuery(predicates: ArticlePredicates): SqlQuery {
  const values: unknown[] = [];
  const conditions: string[] = [];
  const param = (value: unknown) => {
    values.push(value);
    return `$${values.length}`;
  };

  if (predicates.text !== undefined) {
    const terms = searchTerms(predicates.text);
    if (terms.length > 0) {
      const clauses = terms.map((term) => {
        const placeholder = param(`%${escapeLike(term)}%`);
        return `title ilike ${placeholder} or description ilike ${placeholder}`;
      });
      conditions.push(`(${clauses.join(" or ")})`);
    }
  }

  if (predicates.category !== undefined) {
    conditions.push(
      `exists (select 1 from unnest(categories) as category where lower(category) = lower(${param(predicates.category.trim())}))`
    );
  }

  if (predicates.source !== undefined) {
    conditions.push(`lower(source_name) = lower(${param(predicates.source.trim())})`);
  }

  if (predicates.minScore !== undefined) {
    conditions.push(`relevance_score >= ${param(predicates.minScore)}`);
  }

  if (predicates.maxScore !== undefined) {
    conditions.push(`relevance_score <= ${param(predicates.maxScore)}`);
  }

  const box =
    predicates.boundingBox ??
    (predicates.near ? boundingBox(predicates.near.center, predicates.near.radiusKm) : undefined);
  if (box) {
    conditions.push(
      `latitude between ${param(box.minLatitude)} and ${param(box.maxLatitude)}`,
      `longitude between ${param(box.minLongitude)} and ${param(box.maxLongitude)}`
    );
  }

  const where = conditions.length > 0 ? ` where ${conditions.join(" and ")}` : "";
  return {
    text: `select ${ARTICLE_COLUMNS} from articles${where} order by relevance_score desc, published_at desc, id asc`,
    values
  };
}
