// src/lib/earningsQuality/schemas.ts
import { z } from "zod";
import type { PeriodRecord } from "./types";
import { EngineError } from "./errors";

const MetricValueSchema = z.number().finite().nullable().optional();

export const PeriodRecordSchema = z.object({
  entityId: z.string().min(1),
  periodKind: z.enum(["quarterly", "annual"]),
  period: z.string().regex(/^\d{4}(Q[1-4])?$/),
  metrics: z.object({
    toi: MetricValueSchema,
    pbt: MetricValueSchema,
    nii: MetricValueSchema,
    fee: MetricValueSchema,
    opex: MetricValueSchema,
    provision: MetricValueSchema,
    loans: MetricValueSchema,
    nim: MetricValueSchema,
  }),
});

export const PeriodRecordListSchema = z.array(PeriodRecordSchema);

export function parsePeriodRecords(input: unknown): PeriodRecord[] {
  const parsed = PeriodRecordListSchema.safeParse(input);
  if (!parsed.success) {
    throw new EngineError("INVALID_INPUT", "Invalid period records", {
      issues: parsed.error.issues.slice(0, 20).map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data;
}
