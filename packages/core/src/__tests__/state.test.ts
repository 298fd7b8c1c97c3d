import { copyState, createState } from "../state.js";

const t0 = new Date("2024-01-01T00:00:00Z");
const t1 = new Date("2024-01-01T00:00:05Z");

describe("createState", () => {
  test("starts idle and frozen", () => {
    const state = createState<number>(t0);
    expect(state).toEqual({
      data: undefined,
      status: "idle",
      error: undefined,
      timeCreated: t0,
    });
    expect(Object.isFrozen(state)).toBe(true);
  });
});

describe("copyState", () => {
  test("returns a new frozen state and leaves the old one alone", () => {
    const before = createState<number>(t0);
    const after = copyState(before, { data: 3, status: "success", timeCreated: t1 });
    expect(after).toEqual({ data: 3, status: "success", error: undefined, timeCreated: t1 });
    expect(before.status).toBe("idle");
    expect(Object.isFrozen(after)).toBe(true);
  });

  test("drops the error once the status leaves error", () => {
    const failed = copyState(createState<number>(t0), {
      status: "error",
      error: new Error("boom"),
    });
    expect(failed.error).toEqual(new Error("boom"));
    expect(copyState(failed, { status: "loading" }).error).toBeUndefined();
  });

  test("never moves timeCreated backwards", () => {
    const state = createState<number>(t1);
    expect(copyState(state, { timeCreated: t0 }).timeCreated).toBe(t1);
  });
});
