/**
 * Earnings Quality — Attribution Config
 *
 * Floor and cap are parameters, not constants: callers tune them per
 * deployment through overrides or the EARNINGS_* environment variables.
 */

import { z } from "zod";
import { serverEnv } from "@/lib/env/server";
import type { AttributionConfig } from "./types";
import { EngineError } from "./errors";

export const DEFAULT_ATTRIBUTION_CONFIG: Readonly<AttributionConfig> = Object.freeze({
  scoreFloor: 50,
  scoreCap: 500,
  tolerance: 1e-6,
});

export const AttributionConfigSchema = z.object({
  scoreFloor: z.number().finite().positive(),
  scoreCap: z.number().finite().positive(),
  tolerance: z.number().finite().nonnegative(),
});

export function resolveAttributionConfig(overrides?: Partial<AttributionConfig>): AttributionConfig {
  const parsed = AttributionConfigSchema.safeParse({ ...DEFAULT_ATTRIBUTION_CONFIG, ...overrides });
  if (!parsed.success) {
    throw new EngineError("INVALID_CONFIG", "Invalid attribution config", {
      fieldErrors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export function loadAttributionConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): AttributionConfig {
  const parsed = serverEnv(env);
  return resolveAttributionConfig({
    ...(parsed.EARNINGS_SCORE_FLOOR !== undefined ? { scoreFloor: parsed.EARNINGS_SCORE_FLOOR } : {}),
    ...(parsed.EARNINGS_SCORE_CAP !== undefined ? { scoreCap: parsed.EARNINGS_SCORE_CAP } : {}),
    ...(parsed.EARNINGS_IDENTITY_TOLERANCE !== undefined
      ? { tolerance: parsed.EARNINGS_IDENTITY_TOLERANCE }
      : {}),
  });
}
