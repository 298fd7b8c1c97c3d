import { z } from "zod";

/** A snapshot as it is kept in durable storage */
export interface StoredQuery {
  key: string;
  data: unknown;
  /** Epoch milliseconds of the fetch that produced `data` */
  createdAt: number;
}

/**
 * Durable key-value persistence used as a cold-start fallback.
 * Keys are encoded query keys.
 */
export interface StorageBridge {
  get(key: string): Promise<StoredQuery | undefined>;
  set(key: string, stored: StoredQuery): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export const storedQuerySchema = z.object({
  key: z.string(),
  data: z.unknown(),
  createdAt: z.number(),
});

export function parseStoredQuery(raw: unknown): StoredQuery {
  const { key, data, createdAt } = storedQuerySchema.parse(raw);
  return { key, data, createdAt };
}
