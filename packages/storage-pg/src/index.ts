import pg from "pg";
import { z } from "zod";
import type { StorageBridge } from "@stalecache/core";

/** The slice of a pg client or pool this adapter uses */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export type PgStorageOptions = { table?: string } & (
  | { client: PgQueryable }
  | { connectionString: string }
);

export interface PgStorage extends StorageBridge {
  /** Create the table if it doesn't exist */
  ensureTable(): Promise<void>;
  /** End the pool created from `connectionString`. No-op for a passed client. */
  close(): Promise<void>;
}

const TABLE_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const rowSchema = z.object({
  key: z.string(),
  data: z.unknown(),
  // BIGINT comes back from pg as a string
  created_at: z.union([z.string(), z.number()]).pipe(z.coerce.number()),
});

export function createPgStorage(options: PgStorageOptions): PgStorage {
  const table = options.table ?? "stalecache_queries";
  if (!TABLE_NAME.test(table)) {
    throw new Error(`Invalid table name: ${table}`);
  }

  let pool: pg.Pool | null = null;
  let client: PgQueryable;
  if ("client" in options) {
    client = options.client;
  } else {
    const created = new pg.Pool({ connectionString: options.connectionString });
    pool = created;
    client = {
      query: (text, values) => created.query(text, values),
    };
  }

  return {
    async ensureTable() {
      await client.query(
        `CREATE TABLE IF NOT EXISTS "${table}" (key TEXT PRIMARY KEY, data JSONB NOT NULL, created_at BIGINT NOT NULL)`
      );
    },

    async get(key) {
      const { rows } = await client.query(
        `SELECT key, data, created_at FROM "${table}" WHERE key = $1`,
        [key]
      );
      if (rows.length === 0) return undefined;
      const row = rowSchema.parse(rows[0]);
      return { key: row.key, data: row.data, createdAt: row.created_at };
    },

    async set(key, stored) {
      await client.query(
        `INSERT INTO "${table}" (key, data, created_at) VALUES ($1, $2, $3)
         ON CONFLICT (key) DO UPDATE SET data = EXCLUDED.data, created_at = EXCLUDED.created_at
         WHERE "${table}".created_at <= EXCLUDED.created_at`,
        [key, JSON.stringify(stored.data), stored.createdAt]
      );
    },

    async delete(key) {
      await client.query(`DELETE FROM "${table}" WHERE key = $1`, [key]);
    },

    async clear() {
      await client.query(`DELETE FROM "${table}"`);
    },

    async close() {
      await pool?.end();
      pool = null;
    },
  };
}
