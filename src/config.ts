import { z } from "zod";
import { ConfigError } from "./errors";

export const ForyConfigSchema = z
  .object({
    /** Write per-type field metadata so readers tolerate schema changes. */
    compatible: z.boolean().default(false),
    /** Track object identity so shared and cyclic references survive. */
    refTracking: z.boolean().default(true),
    /** Read 64-bit integers as bigint instead of number. */
    useBigInt64: z.boolean().default(false),
    warnOnPrecisionLoss: z.boolean().default(true),
    /** Deepest nesting a read accepts. */
    maxDepth: z.number().int().min(2).default(50),
  })
  .strict();

export type ForyConfigInput = z.input<typeof ForyConfigSchema>;
export type ForyConfig = z.output<typeof ForyConfigSchema>;

/**
 * Validates options and fills in defaults.
 */
export function parseConfig(input: ForyConfigInput = {}): ForyConfig {
  const result = ForyConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join(".");
    throw new ConfigError(path ? `${path}: ${issue.message}` : issue.message);
  }
  return result.data;
}
