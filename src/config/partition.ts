import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { ParameterError } from "../partition/errors.js";
import { readBool, readEnum, readInt, readNumber, readOptionalString } from "./env.js";

/** Pass limit applied when neither the caller nor the environment sets one. */
export const DEFAULT_MAX_PASSES = 10;

/** Balance margin used by the CLI when no flag or variable overrides it. */
export const DEFAULT_MARGIN_PERCENT = 10;

/** Validated engine parameters for a single `partition` call. */
export const PartitionSettingsSchema = z.object({
  numParts: z.number().int("numParts must be an integer").min(2, "numParts must be at least 2"),
  marginPercent: z.number().finite().nonnegative("margin must not be negative"),
  maxPasses: z.number().int().positive("maxPasses must be at least 1"),
  enforceMinimum: z.boolean(),
  seed: z.union([z.string().min(1), z.number().finite()]).optional(),
});

export type PartitionSettings = z.infer<typeof PartitionSettingsSchema>;

/**
 * Parses raw settings and rethrows schema failures as {@link ParameterError},
 * keeping the zod issues in the error details.
 */
export function parsePartitionSettings(raw: unknown): PartitionSettings {
  const parsed = PartitionSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
      .join("; ");
    throw new ParameterError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}

/** Defaults resolved from the environment, overridable by CLI flags. */
export interface PartitionDefaults {
  maxPasses: number;
  marginPercent: number;
  enforceMinimum: boolean;
  logLevel: LogLevel;
  logFile: string | null;
}

/**
 * Reads `KL_MAX_PASSES`, `KL_MARGIN_PERCENT`, `KL_ENFORCE_MIN_SIZE`,
 * `KL_LOG_LEVEL` and `KL_LOG_FILE`. Invalid values fall back to the built-in
 * defaults.
 */
export function loadPartitionDefaults(): PartitionDefaults {
  return {
    maxPasses: readInt("KL_MAX_PASSES", DEFAULT_MAX_PASSES, { min: 1 }),
    marginPercent: readNumber("KL_MARGIN_PERCENT", DEFAULT_MARGIN_PERCENT, { min: 0 }),
    enforceMinimum: readBool("KL_ENFORCE_MIN_SIZE", false),
    logLevel: readEnum("KL_LOG_LEVEL", LOG_LEVELS, "info"),
    logFile: readOptionalString("KL_LOG_FILE") ?? null,
  };
}
