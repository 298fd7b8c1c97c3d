import { createHash } from "crypto";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import type { StorageBridge } from "@stalecache/core";
import { QueryCache } from "@stalecache/query";
import { z } from "zod";
import { createFsStorage } from "../index.js";

let directory: string;

beforeEach(async () => {
  directory = await mkdtemp(path.join(os.tmpdir(), "stalecache-"));
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

describe("createFsStorage", () => {
  test("returns undefined for a key that was never stored", async () => {
    const storage = createFsStorage({ directory: path.join(directory, "missing") });
    expect(await storage.get("n")).toBeUndefined();
  });

  test("stores and replaces snapshots", async () => {
    const storage = createFsStorage({ directory: path.join(directory, "nested") });
    await storage.set('["todos",1]', { key: '["todos",1]', data: { title: "a" }, createdAt: 1 });
    await storage.set('["todos",1]', { key: '["todos",1]', data: { title: "b" }, createdAt: 2 });

    expect(await storage.get('["todos",1]')).toEqual({
      key: '["todos",1]',
      data: { title: "b" },
      createdAt: 2,
    });
    const files = await readdir(path.join(directory, "nested"));
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^[0-9a-f]{64}\.json$/);
  });

  test("keeps the snapshot of the last set when writes overlap", async () => {
    const storage = createFsStorage({ directory });
    const older = { key: "k", data: "x".repeat(5_000_000), createdAt: 1 };
    const newer = { key: "k", data: "small", createdAt: 2 };

    await Promise.all([storage.set("k", older), storage.set("k", newer)]);
    expect(await storage.get("k")).toEqual(newer);
  });

  test("removes the temporary file when a write fails", async () => {
    const storage = createFsStorage({ directory });
    const name = `${createHash("sha256").update("k").digest("hex")}.json`;
    // a directory in the way makes the rename fail
    await mkdir(path.join(directory, name));

    await expect(storage.set("k", { key: "k", data: 1, createdAt: 1 })).rejects.toThrow();
    expect(await readdir(directory)).toEqual([name]);
  });

  test("deletes one key", async () => {
    const storage = createFsStorage({ directory });
    await storage.set("a", { key: "a", data: 1, createdAt: 1 });
    await storage.set("b", { key: "b", data: 2, createdAt: 1 });

    await storage.delete("a");
    await storage.delete("a");
    expect(await storage.get("a")).toBeUndefined();
    expect(await storage.get("b")).toBeDefined();
  });

  test("clear removes stored snapshots only", async () => {
    const storage = createFsStorage({ directory });
    await storage.set("a", { key: "a", data: 1, createdAt: 1 });
    await writeFile(path.join(directory, "notes.txt"), "keep");

    await storage.clear();
    expect(await readdir(directory)).toEqual(["notes.txt"]);
    await createFsStorage({ directory: path.join(directory, "missing") }).clear();
  });

  test("rejects a file that isn't a stored snapshot", async () => {
    const storage = createFsStorage({ directory });
    await storage.set("a", { key: "a", data: 1, createdAt: 1 });
    const [file] = await readdir(directory);
    await writeFile(path.join(directory, file), JSON.stringify({ data: 1 }));

    await expect(storage.get("a")).rejects.toThrow();
  });

  test("gives a restarted cache the last stored value", async () => {
    const fsStorage = createFsStorage({ directory });
    // the cache writes in the background; keep hold of the writes to wait for them
    const writes: Promise<void>[] = [];
    const storage: StorageBridge = {
      ...fsStorage,
      set(key, stored) {
        const write = fsStorage.set(key, stored);
        writes.push(write);
        return write;
      },
    };
    const options = { key: ["profile", 7], schema: z.object({ name: z.string() }) };

    const warm = new QueryCache({ storage });
    await warm.query({ ...options, queryFn: async () => ({ name: "Ada" }) }).resolve();
    warm.reset();
    await Promise.all(writes);
    expect(writes).toHaveLength(1);

    const cold = new QueryCache({ storage });
    const query = cold.query<{ name: string }>({
      ...options,
      queryFn: () => Promise.reject(new Error("offline")),
    });
    const state = await query.resolve();
    cold.reset();

    expect(state).toMatchObject({ data: { name: "Ada" }, status: "error" });
  });
});
