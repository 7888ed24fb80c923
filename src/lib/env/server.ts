import { z } from "zod";

// A blank assignment (`EARNINGS_SCORE_FLOOR=` in .env) counts as unset
const blankAsUnset = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const ServerEnvSchema = z.object({
  // Attribution tuning (all optional; engine defaults apply when unset)
  EARNINGS_SCORE_FLOOR: z.preprocess(blankAsUnset, z.coerce.number().positive().optional()),
  EARNINGS_SCORE_CAP: z.preprocess(blankAsUnset, z.coerce.number().positive().optional()),
  EARNINGS_IDENTITY_TOLERANCE: z.preprocess(blankAsUnset, z.coerce.number().nonnegative().optional()),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function serverEnv(env: Record<string, string | undefined> = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid server environment variables (see logs).");
  }
  return parsed.data;
}
