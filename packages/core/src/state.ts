export type QueryStatus = "idle" | "loading" | "success" | "error";

/** Point-in-time result of a query. Never mutated once created. */
export interface QueryState<T> {
  readonly data: T | undefined;
  readonly status: QueryStatus;
  /** Only set while `status` is "error" */
  readonly error: unknown;
  /** When `data` was last produced by a successful fetch */
  readonly timeCreated: Date;
}

export type StatePatch<T> = Partial<QueryState<T>>;

export function createState<T>(timeCreated: Date, data?: T): QueryState<T> {
  const state: QueryState<T> = {
    data,
    status: "idle",
    error: undefined,
    timeCreated,
  };
  return Object.freeze(state);
}

export function copyState<T>(
  state: QueryState<T>,
  patch: StatePatch<T>
): QueryState<T> {
  const next = { ...state, ...patch };
  // timestamps only move forward within one query
  const timeCreated =
    next.timeCreated.getTime() < state.timeCreated.getTime()
      ? state.timeCreated
      : next.timeCreated;
  const copied: QueryState<T> = {
    ...next,
    timeCreated,
    error: next.status === "error" ? next.error : undefined,
  };
  return Object.freeze(copied);
}
