import { QueryCache, type QueryCacheOptions } from "./queryCache.js";
import type { Query, QueryOptions } from "./query.js";

let defaultCache: QueryCache | null = null;

/** The process-wide cache, created on first use */
export function getQueryCache(): QueryCache {
  if (!defaultCache) defaultCache = new QueryCache();
  return defaultCache;
}

/** Replace the process-wide cache. Queries of the previous one are dropped. */
export function configure(options: QueryCacheOptions = {}): QueryCache {
  const next = new QueryCache(options);
  defaultCache?.reset();
  defaultCache = next;
  return next;
}

export function resetQueryCache(): void {
  defaultCache?.reset();
  defaultCache = null;
}

/** Get or create a query in the process-wide cache */
export function createQuery<T>(options: QueryOptions<T>): Query<T> {
  return getQueryCache().query(options);
}
