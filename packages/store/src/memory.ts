import {
  compareByRelevance,
  matchesPredicates,
  type Article,
  type ArticlePredicates,
  type InteractionEvent
} from "@geonews/retrieval";

import type { ArticleRepository, InteractionRepository, Repositories } from "./types.js";

/** Process-local article storage used by tests and when no database is configured. */
export class MemoryArticleRepository implements ArticleRepository {
  private readonly articles = new Map<string, Article>();

  async query(predicates: ArticlePredicates): Promise<Article[]> {
    return [...this.articles.values()]
      .filter((article) => matchesPredicates(article, predicates))
      .sort(compareByRelevance);
  }

  async findById(id: string): Promise<Article | null> {
    return this.articles.get(id) ?? null;
  }

  async insert(articles: Article[]): Promise<number> {
    let inserted = 0;
    for (const article of articles) {
      if (!this.articles.has(article.id)) {
        this.articles.set(article.id, article);
        inserted++;
      }
    }
    return inserted;
  }

  async setSummary(id: string, summary: string): Promise<boolean> {
    const article = this.articles.get(id);
    if (!article) {
      return false;
    }
    this.articles.set(id, { ...article, summary });
    return true;
  }

  async listMissingSummary(limit: number): Promise<Article[]> {
    return [...this.articles.values()]
      .filter((article) => article.summary === null)
      .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
      .slice(0, limit);
  }

  async count(): Promise<number> {
    return this.articles.size;
  }
}

export class MemoryInteractionRepository implements InteractionRepository {
  private readonly byArticle = new Map<string, InteractionEvent[]>();
  private total = 0;

  async eventsFor(
    articleId: string,
    options: { since?: Date } = {}
  ): Promise<InteractionEvent[]> {
    const events = this.byArticle.get(articleId) ?? [];
    const since = options.since;
    return since ? events.filter((event) => event.occurredAt >= since) : [...events];
  }

  async append(events: InteractionEvent[]): Promise<void> {
    for (const event of events) {
      const list = this.byArticle.get(event.articleId);
      if (list) {
        list.push(event);
      } else {
        this.byArticle.set(event.articleId, [event]);
      }
      this.total++;
    }
  }

  async count(): Promise<number> {
    return this.total;
  }
}

export function createMemoryRepositories(): Repositories {
  return {
    articles: new MemoryArticleRepository(),
    interactions: new MemoryInteractionRepository(),
    close: async () => {}
  };
}
