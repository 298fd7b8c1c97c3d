import {
  encodeKey,
  keyMatchesPrefix,
  resolveConfig,
  type Logger,
  type QueryConfig,
  type QueryConfigInput,
  type QueryKey,
  type QueryState,
  type StorageBridge,
  type UpdateFn,
} from "@stalecache/core";
import { TimerEvictionPolicy, type EvictionPolicy } from "./eviction.js";
import {
  Query,
  type QueryContext,
  type QueryHandle,
  type QueryOptions,
} from "./query.js";

export interface QueryCacheOptions {
  config?: QueryConfigInput;
  storage?: StorageBridge;
  evictionPolicy?: EvictionPolicy;
  logger?: Logger;
  now?: () => Date;
}

/** With neither `key` nor `prefix` every query matches */
export interface InvalidateOptions {
  /** Match this key only */
  key?: QueryKey;
  /** Match every array key that starts with these elements */
  prefix?: QueryKey;
  /** Refetch matching queries that have subscribers (default true) */
  refetchActive?: boolean;
}

export interface DeleteOptions {
  /** Also delete the stored snapshot(s) */
  deleteStorage?: boolean;
}

/**
 * Registry of queries by encoded key. Holds at most one query per key.
 */
export class QueryCache {
  readonly config: QueryConfig;
  readonly storage?: StorageBridge;
  private readonly queries = new Map<string, QueryHandle>();
  private readonly evictionPolicy: EvictionPolicy;
  private readonly logger: Logger;
  private readonly context: QueryContext;

  constructor(options: QueryCacheOptions = {}) {
    this.config = resolveConfig(options.config);
    this.storage = options.storage;
    this.evictionPolicy = options.evictionPolicy ?? new TimerEvictionPolicy();
    this.logger = options.logger ?? console;
    this.context = {
      config: this.config,
      storage: this.storage,
      logger: this.logger,
      now: options.now ?? (() => new Date()),
      lifecycle: {
        onActive: (query) => this.evictionPolicy.onActive(query),
        onInactive: (query) => {
          if (this.queries.get(query.encodedKey) !== query) return;
          this.evictionPolicy.onInactive(query, () => this.evict(query));
        },
      },
    };
  }

  get size(): number {
    return this.queries.size;
  }

  /**
   * Get the query for `options.key`, creating it with this cache's config if
   * the key is new. An existing query keeps its original `queryFn` and options.
   */
  query<T>(options: QueryOptions<T>): Query<T> {
    const query = this.getOrCreate(
      options.key,
      () => new Query<T>(options, this.context)
    );
    if (options.forceRefetch) query.prefetch(true);
    return query;
  }

  getOrCreate<T>(key: QueryKey, factory: () => Query<T>): Query<T> {
    const encodedKey = encodeKey(key);
    const existing = this.getQuery<T>(encodedKey);
    if (existing) return existing;

    const created = factory();
    if (created.encodedKey !== encodedKey) {
      throw new Error(
        `Factory for ${encodedKey} built a query for ${created.encodedKey}`
      );
    }
    // the factory may itself have registered this key
    const registered = this.getQuery<T>(encodedKey);
    if (registered) return registered;

    this.queries.set(encodedKey, created);
    this.evictionPolicy.onInactive(created, () => this.evict(created));
    return created;
  }

  /** The caller decides what data type lives under a key */
  getQuery<T>(key: QueryKey): Query<T> | undefined {
    return this.queries.get(encodeKey(key)) as Query<T> | undefined;
  }

  whereQuery(predicate: (query: QueryHandle) => boolean): QueryHandle[] {
    return [...this.queries.values()].filter(predicate);
  }

  /** Detach a query. The next lookup of its key builds a fresh one. */
  remove(key: QueryKey): boolean {
    const encodedKey = encodeKey(key);
    const query = this.queries.get(encodedKey);
    if (!query) return false;
    this.queries.delete(encodedKey);
    this.evictionPolicy.onRemove(query);
    return true;
  }

  async deleteQuery(
    key: QueryKey,
    { deleteStorage = false }: DeleteOptions = {}
  ): Promise<boolean> {
    const removed = this.remove(key);
    if (deleteStorage && this.storage) {
      const encodedKey = encodeKey(key);
      try {
        await this.storage.delete(encodedKey);
      } catch (error) {
        this.logger.error(`[stalecache] ${encodedKey}: could not delete from storage`, error);
      }
    }
    return removed;
  }

  async deleteCache({ deleteStorage = false }: DeleteOptions = {}): Promise<void> {
    for (const key of [...this.queries.keys()]) this.remove(key);
    if (deleteStorage && this.storage) {
      try {
        await this.storage.clear();
      } catch (error) {
        this.logger.error("[stalecache] could not clear storage", error);
      }
    }
  }

  /** Mark matching queries stale. Returns the queries that matched. */
  invalidateCache({
    key,
    prefix,
    refetchActive = true,
  }: InvalidateOptions = {}): QueryHandle[] {
    const encodedKey = key === undefined ? undefined : encodeKey(key);
    const matched = this.whereQuery(
      (query) =>
        (encodedKey === undefined || query.encodedKey === encodedKey) &&
        (prefix === undefined || keyMatchesPrefix(query.key, prefix))
    );
    for (const query of matched) {
      query.invalidate();
      if (refetchActive && query.subscriberCount > 0) query.prefetch();
    }
    return matched;
  }

  /** Force a refetch of every listed query that exists */
  refetchQueries(keys: QueryKey[]): Promise<QueryState<unknown>[]> {
    const queries = keys.flatMap((key) => this.getQuery<unknown>(key) ?? []);
    return Promise.all(queries.map((query) => query.refetch()));
  }

  updateQuery<T>(key: QueryKey, updateFn: UpdateFn<T>): boolean {
    const query = this.getQuery<T>(key);
    if (!query) return false;
    query.update(updateFn);
    return true;
  }

  setQueryData<T>(key: QueryKey, data: T): boolean {
    return this.updateQuery<T>(key, () => data);
  }

  /**
   * Remove every unsubscribed, idle query that has been inactive longer than
   * its `cacheDuration`. For callers that drive eviction from their own scheduler.
   */
  sweepInactive(now: Date = this.context.now()): QueryHandle[] {
    const expired = this.whereQuery(
      ({ inactiveSince, ignoreCacheDuration, isFetching, cacheDuration }) =>
        inactiveSince !== null &&
        !ignoreCacheDuration &&
        !isFetching &&
        now.getTime() - inactiveSince.getTime() >= cacheDuration
    );
    for (const query of expired) this.remove(query.encodedKey);
    return expired;
  }

  /** Drop every query and pending eviction. Storage is left alone. */
  reset(): void {
    this.evictionPolicy.reset();
    this.queries.clear();
  }

  // a running fetch reports activity again when it settles
  private evict(query: QueryHandle) {
    const current = this.queries.get(query.encodedKey);
    if (current !== query || query.subscriberCount > 0 || query.isFetching) return;
    this.logger.debug(`[stalecache] ${query.encodedKey}: evicted`);
    this.remove(query.encodedKey);
  }
}
