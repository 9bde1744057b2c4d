import type { Logger } from "@geonews/logger";

import { RetrievalFailedError, describeError } from "./errors.js";
import { clusterCell, type ClusterCell } from "./geo.js";
import type { Clock, GeoPoint, TrendingResult } from "./types.js";

export const DEFAULT_TRENDING_TTL_MS = 5 * 60 * 1000;

export type CacheLookupOutcome =
  | "hit"
  | "miss"
  | "expired"
  | "refresh"
  | "stale"
  | "failed";

export type TrendingLookup = {
  clusterKey: string;
  center: GeoPoint;
  computedAt: Date;
  /** True when a recompute failed and older results were served instead. */
  stale: boolean;
  results: TrendingResult[];
};

export type RecomputeTrending = (
  cell: ClusterCell,
  computedAt: Date
) => Promise<TrendingResult[]>;

type CacheEntry = {
  results: TrendingResult[];
  computedAt: Date;
};

export type TrendingResultCacheOptions = {
  recompute: RecomputeTrending;
  logger: Logger;
  ttlMs?: number;
  now?: Clock;
  onLookup?: (outcome: CacheLookupOutcome, clusterKey: string) => void;
};

/**
 * Location-clustered trending results with a fixed TTL. At most one
 * recompute runs per cluster key; concurrent lookups for that key join it
 * while other keys proceed independently. A recompute is not tied to the
 * request that started it and still fills the cache if that caller goes away.
 */
export class TrendingResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<CacheEntry>>();
  private readonly recompute: RecomputeTrending;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly onLookup?: (outcome: CacheLookupOutcome, clusterKey: string) => void;
  readonly ttlMs: number;

  constructor(options: TrendingResultCacheOptions) {
    this.recompute = options.recompute;
    this.logger = options.logger;
    this.ttlMs = options.ttlMs ?? DEFAULT_TRENDING_TTL_MS;
    this.now = options.now ?? (() => new Date());
    this.onLookup = options.onLookup;
  }

  get size(): number {
    return this.entries.size;
  }

  async lookup(
    point: GeoPoint,
    options: { forceRefresh?: boolean } = {}
  ): Promise<TrendingLookup> {
    const cell = clusterCell(point);
    const current = this.entries.get(cell.key);

    if (!options.forceRefresh && current && this.isFresh(current)) {
      this.onLookup?.("hit", cell.key);
      return this.toLookup(cell, current, false);
    }

    this.onLookup?.(
      options.forceRefresh ? "refresh" : current ? "expired" : "miss",
      cell.key
    );

    try {
      const entry = await this.refresh(cell);
      return this.toLookup(cell, entry, false);
    } catch (error) {
      const previous = this.entries.get(cell.key);
      if (!previous) {
        this.onLookup?.("failed", cell.key);
        this.logger.error(
          { clusterKey: cell.key, error: describeError(error) },
          "Trending recompute failed with no cached results"
        );
        throw new RetrievalFailedError(cell.key, { cause: error });
      }

      this.onLookup?.("stale", cell.key);
      this.logger.error(
        {
          clusterKey: cell.key,
          computedAt: previous.computedAt.toISOString(),
          error: describeError(error)
        },
        "Trending recompute failed, serving previous results"
      );
      return this.toLookup(cell, previous, !this.isFresh(previous));
    }
  }

  /** Drops expired entries that have no recompute in flight. */
  sweep(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry) && !this.inFlight.has(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug({ removed, remaining: this.entries.size }, "Swept expired trending entries");
    }
    return removed;
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.now().getTime() - entry.computedAt.getTime() < this.ttlMs;
  }

  private refresh(cell: ClusterCell): Promise<CacheEntry> {
    const pending = this.inFlight.get(cell.key);
    if (pending) {
      return pending;
    }

    const computedAt = this.now();
    const promise = Promise.resolve()
      .then(() => this.recompute(cell, computedAt))
      .then((results) => {
        const entry: CacheEntry = { results, computedAt };
        this.entries.set(cell.key, entry);
        this.logger.debug(
          { clusterKey: cell.key, count: results.length },
          "Trending results recomputed"
        );
        return entry;
      })
      .finally(() => {
        this.inFlight.delete(cell.key);
      });

    this.inFlight.set(cell.key, promise);
    return promise;
  }

  private toLookup(cell: ClusterCell, entry: CacheEntry, stale: boolean): TrendingLookup {
    return {
      clusterKey: cell.key,
      center: cell.center,
      computedAt: entry.computedAt,
      stale,
      results: entry.results
    };
  }
}
