import { z } from "zod";

const duration = z.number().int().nonnegative();

export const queryConfigSchema = z
  .object({
    /** Minimum age (ms) before cached data is refetched */
    refetchDuration: duration.default(4_000),
    /** How long (ms) an unsubscribed query stays in the cache */
    cacheDuration: duration.default(5 * 60_000),
    /** Re-raise fetch errors to whoever awaits the fetch */
    shouldRethrow: z.boolean().default(false),
    /** Default for queries that don't say whether they are persisted */
    storeQuery: z.boolean().default(true),
  })
  .strict();

export type QueryConfig = z.infer<typeof queryConfigSchema>;
export type QueryConfigInput = z.input<typeof queryConfigSchema>;

/** Throws a ZodError when a value is out of range or a field is unknown */
export function resolveConfig(config: QueryConfigInput = {}): QueryConfig {
  return queryConfigSchema.parse(config);
}

export const defaultQueryConfig: QueryConfig = resolveConfig();
