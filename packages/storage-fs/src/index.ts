import { createHash, randomUUID } from "crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { parseStoredQuery, type StorageBridge, type StoredQuery } from "@stalecache/core";

export interface FsStorageOptions {
  /** Created on first write */
  directory: string;
}

/**
 * One JSON file per query, named by the SHA-256 of its encoded key.
 * Writes to one key land in the order `set` was called.
 */
export function createFsStorage({ directory }: FsStorageOptions): StorageBridge {
  const writes = new Map<string, Promise<void>>();

  function fileFor(key: string) {
    const name = createHash("sha256").update(key).digest("hex");
    return path.join(directory, `${name}.json`);
  }

  async function write(key: string, stored: StoredQuery) {
    await mkdir(directory, { recursive: true });
    // write then rename, so readers never see half a file
    const file = fileFor(key);
    const tmp = `${file}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(stored), "utf8");
      await rename(tmp, file);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }
  }

  return {
    async get(key) {
      let raw: string;
      try {
        raw = await readFile(fileFor(key), "utf8");
      } catch (error) {
        if (isNotFound(error)) return undefined;
        throw error;
      }
      return parseStoredQuery(JSON.parse(raw));
    },

    async set(key, stored) {
      const run = () => write(key, stored);
      // the previous write's failure belongs to its own caller
      const next = (writes.get(key) ?? Promise.resolve()).then(run, run);
      writes.set(key, next);
      try {
        await next;
      } finally {
        if (writes.get(key) === next) writes.delete(key);
      }
    },

    async delete(key) {
      await rm(fileFor(key), { force: true });
    },

    async clear() {
      let names: string[];
      try {
        names = await readdir(directory);
      } catch (error) {
        if (isNotFound(error)) return;
        throw error;
      }
      await Promise.all(
        names
          .filter((name) => name.endsWith(".json"))
          .map((name) => rm(path.join(directory, name), { force: true }))
      );
    },
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
