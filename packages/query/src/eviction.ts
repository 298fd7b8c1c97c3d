import type { QueryHandle } from "./query.js";

// setTimeout fires after 1 ms when given more than this
const MAX_TIMEOUT = 2 ** 31 - 1;

/**
 * Decides when an unsubscribed query leaves its cache.
 *
 * The cache reports activity; `evict` removes the query only if the cache
 * still holds that same instance, nobody has subscribed since and no fetch
 * is running.
 */
export interface EvictionPolicy {
  onInactive(query: QueryHandle, evict: () => void): void;
  onActive(query: QueryHandle): void;
  onRemove(query: QueryHandle): void;
  /** Drop all pending work. The policy stays usable. */
  reset(): void;
}

/** Removes a query `cacheDuration` ms after its last activity */
export class TimerEvictionPolicy implements EvictionPolicy {
  private timers = new Map<QueryHandle, NodeJS.Timeout>();

  onInactive(query: QueryHandle, evict: () => void): void {
    this.cancel(query);
    if (query.ignoreCacheDuration) return;
    this.schedule(query, query.cacheDuration, evict);
  }

  onActive(query: QueryHandle): void {
    this.cancel(query);
  }

  onRemove(query: QueryHandle): void {
    this.cancel(query);
  }

  reset(): void {
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
  }

  get pending(): number {
    return this.timers.size;
  }

  private schedule(query: QueryHandle, delay: number, evict: () => void) {
    const timer = setTimeout(() => {
      if (delay > MAX_TIMEOUT) {
        this.schedule(query, delay - MAX_TIMEOUT, evict);
        return;
      }
      this.timers.delete(query);
      evict();
    }, Math.min(delay, MAX_TIMEOUT));
    timer.unref();
    this.timers.set(query, timer);
  }

  private cancel(query: QueryHandle) {
    const timer = this.timers.get(query);
    if (!timer) return;
    clearTimeout(timer);
    this.timers.delete(query);
  }
}

/** Never evicts. Queries leave only through `QueryCache.remove` or a sweep. */
export class ManualEvictionPolicy implements EvictionPolicy {
  onInactive(): void {}
  onActive(): void {}
  onRemove(): void {}
  reset(): void {}
}
