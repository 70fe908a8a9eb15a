import { componentLogger } from "../utils/logger";

const log = componentLogger("recommendation-cache");

interface CacheEntry<V> {
  value: V;
  owner: string;
  createdAt: number;
}

interface InFlight<V> {
  promise: Promise<V>;
  owner: string;
}

export interface RecommendationCacheOptions<V> {
  ttlMs: number;
  maxEntries: number;
  /* Decides whether a computed value is stored. Defaults to storing everything. */
  isCacheable?: (value: V) => boolean;
  /* Clock, injectable for tests. */
  now?: () => number;
}

/**
 * TTL- and size-bounded memo of analysis results with single-flight
 * computation: concurrent callers for one key share a single in-flight
 * promise, so only one of them triggers `compute`.
 *
 * Entries are grouped by owner (a student id) so a profile change can drop
 * all of that student's results at once.
 */
export class RecommendationCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, InFlight<V>>();
  /* Bumped by invalidate(); computations started under an older generation are not stored. */
  private readonly generations = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly isCacheable: (value: V) => boolean;
  private readonly now: () => number;

  constructor(options: RecommendationCacheOptions<V>) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.isCacheable = options.isCacheable ?? (() => true);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns a copy of the live entry for `key`, dropping it first if it has
   * expired. Callers may mutate what they get back.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() - entry.createdAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return structuredClone(entry.value);
  }

  /**
   * Returns the cached value for `key`, or joins the computation already
   * running for it, or starts `compute`. A rejected computation is shared
   * with every waiter and leaves nothing behind.
   */
  getOrCompute(
    key: string,
    owner: string,
    compute: () => Promise<V>,
  ): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      log.debug("Cache hit", { key });
      return Promise.resolve(cached);
    }

    const running = this.inFlight.get(key);
    if (running) {
      log.debug("Joining in-flight computation", { key });
      return running.promise;
    }

    const generation = this.generationOf(owner);
    const promise: Promise<V> = Promise.resolve()
      .then(compute)
      .then((value) => {
        if (this.generationOf(owner) === generation && this.isCacheable(value)) {
          this.store(key, owner, value);
        }
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key)?.promise === promise) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, { promise, owner });
    return promise;
  }

  /**
   * Drops every entry of `owner` and keeps computations of `owner` that are
   * still running from being stored when they finish.
   */
  invalidate(owner: string): number {
    this.generations.set(owner, this.generationOf(owner) + 1);

    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.owner === owner) {
        this.entries.delete(key);
        removed++;
      }
    }
    for (const [key, flight] of this.inFlight) {
      if (flight.owner === owner) {
        // Later callers must not join a computation over stale input
        this.inFlight.delete(key);
      }
    }

    log.debug("Cache invalidated", { owner, removed });
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
    this.generations.clear();
  }

  private generationOf(owner: string): number {
    return this.generations.get(owner) ?? 0;
  }

  private store(key: string, owner: string, value: V): void {
    // Re-inserting moves the key to the end of the insertion order
    this.entries.delete(key);
    this.entries.set(key, { value: structuredClone(value), owner, createdAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}
