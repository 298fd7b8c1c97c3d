import { BehaviorSubject, type Observable } from "rxjs";
import type { ZodType, ZodTypeDef } from "zod";
import {
  copyState,
  createState,
  encodeKey,
  type Logger,
  type QueryConfig,
  type QueryFn,
  type QueryKey,
  type QueryState,
  type StatePatch,
  type StorageBridge,
  type Subscriber,
  type Subscription,
  type UpdateFn,
} from "@stalecache/core";

/* ---------------- Options ---------------- */
export interface QueryOptions<T> {
  key: QueryKey;
  queryFn: QueryFn<T>;
  /** Persist results and fall back to them on a cold start */
  storeQuery?: boolean;
  refetchDuration?: number;
  cacheDuration?: number;
  /** Never treat cached data as stale because of its age */
  ignoreRefetchDuration?: boolean;
  /** Never evict the query while it is unsubscribed */
  ignoreCacheDuration?: boolean;
  /** Start a refetch when the query is requested, even if it is cached */
  forceRefetch?: boolean;
  /** Validates data read back from storage. Stored data is ignored without it. */
  schema?: ZodType<T, ZodTypeDef, unknown>;
  /** Converts data before it is written to storage */
  serialize?: (data: T) => unknown;
}

export interface SubscribeOptions {
  /** Resolve the query in the background once subscribed (default true) */
  resolve?: boolean;
}

/** Callbacks the owning cache uses to track subscriber activity */
export interface QueryLifecycle {
  onActive(query: QueryHandle): void;
  onInactive(query: QueryHandle): void;
}

export interface QueryContext {
  config: QueryConfig;
  storage?: StorageBridge;
  logger: Logger;
  now: () => Date;
  lifecycle?: QueryLifecycle;
}

/** The part of a query that doesn't depend on its data type */
export interface QueryHandle {
  readonly key: QueryKey;
  readonly encodedKey: string;
  readonly state: QueryState<unknown>;
  readonly cacheDuration: number;
  readonly ignoreCacheDuration: boolean;
  readonly subscriberCount: number;
  /** Time the last subscriber left, or creation time. Null while subscribed. */
  readonly inactiveSince: Date | null;
  readonly isStale: boolean;
  readonly isFetching: boolean;
  refetch(): Promise<QueryState<unknown>>;
  prefetch(forceRefetch?: boolean): void;
  invalidate(): void;
}

/* ---------------- Query ---------------- */

/**
 * Fetches and caches the result of `queryFn` for one key.
 *
 * At most one fetch runs at a time: callers that ask while a fetch is
 * outstanding wait for that fetch instead of starting another one. Every
 * state change is emitted to subscribers in order.
 */
export class Query<T> implements QueryHandle {
  readonly key: QueryKey;
  readonly encodedKey: string;
  readonly storeQuery: boolean;
  readonly refetchDuration: number;
  readonly cacheDuration: number;
  readonly ignoreRefetchDuration: boolean;
  readonly ignoreCacheDuration: boolean;

  private readonly queryFn: QueryFn<T>;
  private readonly schema?: ZodType<T, ZodTypeDef, unknown>;
  private readonly serialize?: (data: T) => unknown;
  private readonly context: QueryContext;
  private readonly subject: BehaviorSubject<QueryState<T>>;
  private current: QueryState<T>;
  private inFlight: Promise<void> | null = null;
  private invalidated = false;
  private subscribers = 0;
  private lastActive: Date | null;
  private lastWrite: Promise<void> = Promise.resolve();

  constructor(options: QueryOptions<T>, context: QueryContext) {
    const { config } = context;
    this.key = options.key;
    this.encodedKey = encodeKey(options.key);
    this.queryFn = options.queryFn;
    this.schema = options.schema;
    this.serialize = options.serialize;
    this.storeQuery = options.storeQuery ?? config.storeQuery;
    this.refetchDuration = options.refetchDuration ?? config.refetchDuration;
    this.cacheDuration = options.cacheDuration ?? config.cacheDuration;
    this.ignoreRefetchDuration = options.ignoreRefetchDuration ?? false;
    this.ignoreCacheDuration = options.ignoreCacheDuration ?? false;
    this.context = context;
    this.current = createState<T>(context.now());
    this.subject = new BehaviorSubject(this.current);
    this.lastActive = this.current.timeCreated;
  }

  get state(): QueryState<T> {
    return this.current;
  }

  /** Current state first, then every later one */
  get stream(): Observable<QueryState<T>> {
    return this.subject.asObservable();
  }

  get subscriberCount(): number {
    return this.subscribers;
  }

  get inactiveSince(): Date | null {
    return this.lastActive;
  }

  get isFetching(): boolean {
    return this.inFlight !== null;
  }

  get isStale(): boolean {
    if (this.invalidated) return true;
    if (this.ignoreRefetchDuration) return false;
    const age = this.context.now().getTime() - this.current.timeCreated.getTime();
    return age > this.refetchDuration;
  }

  /**
   * Return cached data while it is fresh, otherwise fetch it.
   *
   * `forceRefetch` skips the freshness check but still joins a fetch that is
   * already running.
   */
  async resolve(forceRefetch = false): Promise<QueryState<T>> {
    const { status, data } = this.current;
    if (!forceRefetch && !this.isStale && status !== "error" && data !== undefined) {
      this.emit();
      this.markUsed();
      return this.current;
    }
    await (this.inFlight ?? this.startFetch());
    return this.current;
  }

  refetch(): Promise<QueryState<T>> {
    return this.resolve(true);
  }

  /** Resolve without waiting. Errors are already in the state, so they are only logged. */
  prefetch(forceRefetch = false): void {
    this.resolve(forceRefetch).catch((error: unknown) => {
      this.context.logger.error(`[stalecache] ${this.encodedKey}: fetch failed`, error);
    });
  }

  /** Mark the data stale so the next resolve fetches again */
  invalidate(): void {
    this.invalidated = true;
  }

  /** Replace the data locally. Status and timestamp are kept. */
  update(updateFn: UpdateFn<T>): QueryState<T> {
    const data = updateFn(this.current.data);
    if (data === undefined) {
      throw new Error(`Update for ${this.encodedKey} returned undefined`);
    }
    this.setState({ data });
    this.emit();
    return this.current;
  }

  subscribe(
    fn: Subscriber<QueryState<T>>,
    { resolve = true }: SubscribeOptions = {}
  ): Subscription {
    const sub = this.subject.subscribe(fn);
    this.subscribers++;
    if (this.subscribers === 1) {
      this.lastActive = null;
      this.context.lifecycle?.onActive(this);
    }
    if (resolve) this.prefetch();

    let attached = true;
    return {
      unsubscribe: () => {
        if (!attached) return;
        attached = false;
        sub.unsubscribe();
        this.subscribers--;
        if (this.subscribers === 0) {
          this.lastActive = this.context.now();
          this.context.lifecycle?.onInactive(this);
        }
      },
    };
  }

  private setState(patch: StatePatch<T>) {
    this.current = copyState(this.current, patch);
  }

  private emit() {
    this.subject.next(this.current);
  }

  // an unsubscribed query that was just used restarts its eviction countdown
  private markUsed() {
    if (this.subscribers > 0) return;
    this.lastActive = this.context.now();
    this.context.lifecycle?.onInactive(this);
  }

  // The handle is recorded before the fetch body runs, so a subscriber that
  // calls resolve() from inside an emission joins this fetch.
  private startFetch(): Promise<void> {
    let settle: () => void = () => {};
    let fail: (error: unknown) => void = () => {};
    const inFlight = new Promise<void>((resolve, reject) => {
      settle = resolve;
      fail = reject;
    });
    this.inFlight = inFlight;
    void this.fetch().then(settle, fail);
    return inFlight;
  }

  private async fetch(): Promise<void> {
    // an invalidate() during this fetch still applies after it
    this.invalidated = false;
    this.setState({ status: "loading" });
    this.emit();
    try {
      if (this.current.data === undefined && this.storeQuery) {
        const stored = await this.readFromStorage();
        // data may have been set by update() while storage was read
        if (stored !== undefined && this.current.data === undefined) {
          this.setState({ data: stored });
          this.emit();
        }
      }

      const data = await this.queryFn();
      if (data === undefined) {
        throw new Error(`Query ${this.encodedKey} resolved to undefined`);
      }
      this.setState({
        data,
        status: "success",
        timeCreated: this.context.now(),
      });
      if (this.storeQuery) this.persist(this.current);
    } catch (error) {
      this.setState({ status: "error", error });
      if (this.context.config.shouldRethrow) throw error;
    } finally {
      this.inFlight = null;
      this.emit();
      this.markUsed();
    }
  }

  private async readFromStorage(): Promise<T | undefined> {
    const { storage, logger } = this.context;
    if (!storage) return undefined;
    if (!this.schema) {
      logger.debug(`[stalecache] ${this.encodedKey}: no schema, ignoring stored data`);
      return undefined;
    }

    let raw: unknown;
    try {
      const stored = await storage.get(this.encodedKey);
      if (stored === undefined) return undefined;
      raw = stored.data;
    } catch (error) {
      logger.error(`[stalecache] ${this.encodedKey}: could not read from storage`, error);
      return undefined;
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`[stalecache] ${this.encodedKey}: invalid stored data`, parsed.error);
      return undefined;
    }
    return parsed.data;
  }

  // writes run one after another so an older snapshot never lands last
  private persist(state: QueryState<T>) {
    this.lastWrite = this.lastWrite
      .then(() => this.writeToStorage(state))
      .catch((error: unknown) => {
        this.context.logger.error(
          `[stalecache] ${this.encodedKey}: could not write to storage`,
          error
        );
      });
  }

  private async writeToStorage(state: QueryState<T>): Promise<void> {
    const { storage } = this.context;
    if (!storage || state.data === undefined) return;
    await storage.set(this.encodedKey, {
      key: this.encodedKey,
      data: this.serialize ? this.serialize(state.data) : state.data,
      createdAt: state.timeCreated.getTime(),
    });
  }
}
