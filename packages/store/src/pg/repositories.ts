import type {
  Article,
  ArticlePredicates,
  InteractionEvent
} from "@geonews/retrieval";

import type { ArticleRepository, InteractionRepository } from "../types.js";
import type { Queryable } from "./queryable.js";
import { toArticle, toCount, toInteraction } from "./rows.js";
import { ARTICLE_COLUMNS, buildArticleQuery } from "./sql.js";

export class PgArticleRepository implements ArticleRepository {
  private readonly db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  async query(predicates: ArticlePredicates): Promise<Article[]> {
    const { text, values } = buildArticleQuery(predicates);
    const result = await this.db.query(text, values);
    return result.rows.map(toArticle);
  }

  async findById(id: string): Promise<Article | null> {
    const result = await this.db.query(
      `select ${ARTICLE_COLUMNS} from articles where id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toArticle(result.rows[0]) : null;
  }

  async insert(articles: Article[]): Promise<number> {
    let inserted = 0;
    for (const article of articles) {
      const result = await this.db.query(
        `insert into articles (${ARTICLE_COLUMNS})
         values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         on conflict (id) do nothing`,
        [
          article.id,
          article.title,
          article.description,
          article.url,
          article.publishedAt,
          article.sourceName,
          article.categories,
          article.relevanceScore,
          article.location?.latitude ?? null,
          article.location?.longitude ?? null,
          article.summary
        ]
      );
      inserted += result.rowCount ?? 0;
    }
    return inserted;
  }

  async setSummary(id: string, summary: string): Promise<boolean> {
    const result = await this.db.query(
      "update articles set summary = $2 where id = $1",
      [id, summary]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listMissingSummary(limit: number): Promise<Article[]> {
    const result = await this.db.query(
      `select ${ARTICLE_COLUMNS} from articles where summary is null order by published_at desc limit $1`,
      [limit]
    );
    return result.rows.map(toArticle);
  }

  async count(): Promise<number> {
    const result = await this.db.query("select count(*) as count from articles");
    return toCount(result.rows);
  }
}

const INTERACTION_COLUMNS =
  "id, article_id, kind, occurred_at, user_id, user_latitude, user_longitude";

export class PgInteractionRepository implements InteractionRepository {
  private readonly db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  async eventsFor(
    articleId: string,
    options: { since?: Date } = {}
  ): Promise<InteractionEvent[]> {
    const result = options.since
      ? await this.db.query(
          `select ${INTERACTION_COLUMNS} from interactions where article_id = $1 and occurred_at >= $2 order by occurred_at asc`,
          [articleId, options.since]
        )
      : await this.db.query(
          `select ${INTERACTION_COLUMNS} from interactions where article_id = $1 order by occurred_at asc`,
          [articleId]
        );
    return result.rows.map(toInteraction);
  }

  async append(events: InteractionEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    const values: unknown[] = [];
    const tuples = events.map((event) => {
      const offset = values.length;
      values.push(
        event.id,
        event.articleId,
        event.kind,
        event.occurredAt,
        event.userId,
        event.userLocation?.latitude ?? null,
        event.userLocation?.longitude ?? null
      );
      return `(${Array.from({ length: 7 }, (_, index) => `$${offset + index + 1}`).join(", ")})`;
    });

    await this.db.query(
      `insert into interactions (${INTERACTION_COLUMNS}) values ${tuples.join(", ")}`,
      values
    );
  }

  async count(): Promise<number> {
    const result = await this.db.query("select count(*) as count from interactions");
    return toCount(result.rows);
  }
}
