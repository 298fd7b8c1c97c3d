import type { StorageBridge, StoredQuery } from "./storage.js";

/** Map-backed storage for tests and for processes that only need a warm cache */
export function createMemoryStorage(): StorageBridge & {
  readonly size: number;
} {
  const store = new Map<string, StoredQuery>();
  return {
    get size() {
      return store.size;
    },
    async get(key) {
      return store.get(key);
    },
    async set(key, stored) {
      store.set(key, { ...stored });
    },
    async delete(key) {
      store.delete(key);
    },
    async clear() {
      store.clear();
    },
  };
}
