import type { Logger } from "@stalecache/core";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending promise callbacks run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function createLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

/** A clock tests move by hand */
export function createClock(start = "2024-01-01T00:00:00Z") {
  let current = new Date(start);
  return {
    now: () => current,
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
  };
}
