/**
 * Server configuration from environment variables.
 */

import * as z from "zod/v4";
import { Err, Ok, type Result } from "@codenav/core";
import { DEFAULT_LIMITS, type QueryLimits } from "./core/ports/providers.js";

const limit = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  CODENAV_ROOT: z.string().min(1).optional(),
  CODENAV_SNAPSHOT: z.string().min(1).optional(),
  CODENAV_TSCONFIG: z.string().min(1).optional(),
  CODENAV_MAX_TYPE_DEPTH: limit(DEFAULT_LIMITS.maxTypeDepth),
  CODENAV_MAX_SUBTYPES: limit(DEFAULT_LIMITS.maxSubtypes),
  CODENAV_MAX_CALL_STACK_DEPTH: limit(DEFAULT_LIMITS.maxCallStackDepth),
  CODENAV_MAX_CALLS_PER_LEVEL: limit(DEFAULT_LIMITS.maxCallsPerLevel),
  CODENAV_MAX_POLYMORPHIC_METHODS: limit(DEFAULT_LIMITS.maxPolymorphicMethods),
  CODENAV_MAX_IMPLEMENTATIONS: limit(DEFAULT_LIMITS.maxImplementations),
  CODENAV_MAX_USAGES: limit(DEFAULT_LIMITS.maxUsages),
});

export interface HierarchyConfig {
  /** Workspace root; relative paths in queries resolve against it */
  root: string;
  /** JSON code-model snapshot to serve instead of the TypeScript workspace */
  snapshot: string | null;
  tsconfig: string | null;
  limits: QueryLimits;
}

/**
 * Read the configuration. Empty variables count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): Result<HierarchyConfig, Error> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("CODENAV_") && value !== undefined && value !== "")
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return Err(new Error(`Invalid configuration: ${issues.join("; ")}`));
  }

  const vars = parsed.data;
  return Ok({
    root: vars.CODENAV_ROOT ?? cwd,
    snapshot: vars.CODENAV_SNAPSHOT ?? null,
    tsconfig: vars.CODENAV_TSCONFIG ?? null,
    limits: {
      maxTypeDepth: vars.CODENAV_MAX_TYPE_DEPTH,
      maxSubtypes: vars.CODENAV_MAX_SUBTYPES,
      maxCallStackDepth: vars.CODENAV_MAX_CALL_STACK_DEPTH,
      maxCallsPerLevel: vars.CODENAV_MAX_CALLS_PER_LEVEL,
      maxPolymorphicMethods: vars.CODENAV_MAX_POLYMORPHIC_METHODS,
      maxImplementations: vars.CODENAV_MAX_IMPLEMENTATIONS,
      maxUsages: vars.CODENAV_MAX_USAGES,
    },
  });
}
