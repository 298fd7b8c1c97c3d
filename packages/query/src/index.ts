export {
  Query,
  type QueryContext,
  type QueryHandle,
  type QueryLifecycle,
  type QueryOptions,
  type SubscribeOptions,
} from "./query.js";
export {
  QueryCache,
  type DeleteOptions,
  type InvalidateOptions,
  type QueryCacheOptions,
} from "./queryCache.js";
export {
  ManualEvictionPolicy,
  TimerEvictionPolicy,
  type EvictionPolicy,
} from "./eviction.js";
export { configure, createQuery, getQueryCache, resetQueryCache } from "./defaults.js";
export type {
  Logger,
  QueryConfig,
  QueryKey,
  QueryState,
  QueryStatus,
  StorageBridge,
  StoredQuery,
  Subscription,
} from "@stalecache/core";
