import type {
  Article,
  ArticleStore,
  InteractionEvent,
  InteractionStore
} from "@geonews/retrieval";

export interface ArticleRepository extends ArticleStore {
  /** Inserts articles whose id is not stored yet; returns how many were added. */
  insert(articles: Article[]): Promise<number>;
  setSummary(id: string, summary: string): Promise<boolean>;
  listMissingSummary(limit: number): Promise<Article[]>;
  count(): Promise<number>;
}

export interface InteractionRepository extends InteractionStore {
  append(events: InteractionEvent[]): Promise<void>;
  count(): Promise<number>;
}

export type Repositories = {
  articles: ArticleRepository;
  interactions: InteractionRepository;
  /** Releases connections; a no-op for in-memory storage. */
  close(): Promise<void>;
};
