/**
 * Earnings Quality — Flat Columns
 *
 * Column layout for keyed stores: primary horizons (T12M, Annual) are
 * unsuffixed, QoQ and YoY carry "_QoQ" / "_YoY".
 */

import type { DecompositionRow, MetricKey, MetricValues, ScoreKey, ScoreSet } from "./types";
import { HORIZONS } from "./horizons";

export type FlatValue = string | number | boolean | null;
export type FlatRow = Record<string, FlatValue>;

const METRIC_COLUMNS: ReadonlyArray<[MetricKey, string]> = [
  ["toi", "TOI"],
  ["pbt", "PBT"],
  ["nii", "NII"],
  ["fee", "Fee"],
  ["opex", "OPEX"],
  ["provision", "Provision"],
  ["loans", "Loans"],
  ["nim", "NIM"],
  ["coreRevenue", "CoreRevenue"],
  ["coreProfit", "CoreProfit"],
  ["nonRecurring", "NonRecurring"],
];

const SCORE_COLUMNS: ReadonlyArray<[ScoreKey, string]> = [
  ["topLine", "TopLine"],
  ["cost", "Cost"],
  ["nonRecurring", "NonRec"],
  ["nii", "NII"],
  ["fee", "Fee"],
  ["opex", "OPEX"],
  ["provision", "Provision"],
  ["loan", "Loan"],
  ["margin", "Margin"],
];

export function decompositionRowKey(row: Pick<DecompositionRow, "entityId" | "horizon" | "period">): string {
  return `${row.entityId}|${row.horizon}|${row.period}`;
}

function metricColumns(out: FlatRow, values: MetricValues | null, infix: string, suffix: string) {
  for (const [key, name] of METRIC_COLUMNS) {
    out[`${name}${infix}${suffix}`] = values ? values[key] : null;
  }
}

function scoreColumns(out: FlatRow, scores: ScoreSet | null, kind: "Score" | "Impact", suffix: string) {
  for (const [key, name] of SCORE_COLUMNS) {
    out[`${name}${kind}${suffix}`] = scores ? scores[key] : null;
  }
}

/**
 * Horizon-suffixed value columns only, without key columns.
 */
export function decompositionColumns(row: DecompositionRow): FlatRow {
  const suffix = HORIZONS[row.horizon].columnSuffix;
  const out: FlatRow = {};

  metricColumns(out, row.current, "", suffix);
  metricColumns(out, row.prior, "_Prior", suffix);
  metricColumns(out, row.change, "_Change", suffix);
  out[`PriorPeriod${suffix}`] = row.priorPeriod;
  out[`GrowthPct${suffix}`] = row.growthPct;
  out[`LoanGrowthPct${suffix}`] = row.loanGrowthPct;
  scoreColumns(out, row.scores, "Score", suffix);
  scoreColumns(out, row.impacts, "Impact", suffix);
  out[`TotalImpact${suffix}`] = row.totalImpact;
  out[`ImpactDiscrepancy${suffix}`] = row.impactDiscrepancy;
  out[`SmallDenomFlag${suffix}`] = row.flags.smallDenominator;
  out[`CapFlag${suffix}`] = row.flags.capped;
  out[`ImpactInconsistentFlag${suffix}`] = row.flags.impactInconsistent;

  return out;
}

export function flattenDecompositionRow(row: DecompositionRow): FlatRow {
  return {
    Entity: row.entityId,
    Horizon: HORIZONS[row.horizon].label,
    Period: row.period,
    ...decompositionColumns(row),
  };
}

/**
 * Merge all horizons of one (entity, period kind, period) into a single wide
 * record, in first-seen order.
 */
export function widenDecompositionRows(rows: readonly DecompositionRow[]): FlatRow[] {
  const wide = new Map<string, FlatRow>();
  for (const row of rows) {
    const key = `${row.entityId}|${row.periodKind}|${row.period}`;
    let target = wide.get(key);
    if (!target) {
      target = { Entity: row.entityId, PeriodKind: row.periodKind, Period: row.period };
      wide.set(key, target);
    }
    Object.assign(target, decompositionColumns(row));
  }
  return [...wide.values()];
}
