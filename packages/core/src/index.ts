/* ---------------- Core Types ---------------- */
export type Subscriber<T> = (value: T) => void;
export type QueryFn<T> = () => Promise<T>;
export type UpdateFn<T> = (prev: T | undefined) => T;
export type Logger = Pick<Console, "debug" | "warn" | "error">;

export interface Subscription {
  unsubscribe: () => void;
}

export {
  createState,
  copyState,
  type QueryState,
  type QueryStatus,
  type StatePatch,
} from "./state.js";
export { encodeKey, keyMatchesPrefix, type QueryKey } from "./keys.js";
export {
  defaultQueryConfig,
  queryConfigSchema,
  resolveConfig,
  type QueryConfig,
  type QueryConfigInput,
} from "./config.js";
export {
  parseStoredQuery,
  storedQuerySchema,
  type StorageBridge,
  type StoredQuery,
} from "./storage.js";
export { createMemoryStorage } from "./memoryStorage.js";
