/**
 * Earnings Quality — Earnings Surprises
 *
 * Ranks entities for one period, either by PBT growth under a single horizon
 * or by a combined QoQ/YoY percentile score. Entities whose period PBT is
 * below `minBase` in magnitude are reported as belowBase, not ranked.
 */

import type { DecompositionRow, HorizonId } from "./types";

const DEFAULT_LIMIT = 10;

export interface SurpriseOptions {
  horizon: HorizonId;
  period: string;
  /** Minimum |PBT| for the period; defaults to 0 (no filter) */
  minBase?: number;
  limit?: number;
}

export interface SurpriseEntry {
  entityId: string;
  pbt: number;
  growthPct: number;
  topLineImpact: number | null;
  costImpact: number | null;
  nonRecurringImpact: number | null;
  flags: DecompositionRow["flags"];
}

export interface EarningsSurprises {
  horizon: HorizonId;
  period: string;
  gainers: SurpriseEntry[];
  decliners: SurpriseEntry[];
  excluded: string[];
  belowBase: string[];
}

export interface CombinedSurpriseOptions {
  period: string;
  minBase?: number;
  limit?: number;
}

export interface CombinedSurpriseEntry {
  entityId: string;
  pbt: number;
  qoqGrowthPct: number | null;
  yoyGrowthPct: number | null;
  /** Percentile rank in (0, 1]; 1 is the strongest growth */
  qoqRank: number | null;
  yoyRank: number | null;
  /** Mean of whichever of qoqRank / yoyRank exist */
  combinedScore: number;
}

export interface CombinedEarningsSurprises {
  period: string;
  gainers: CombinedSurpriseEntry[];
  decliners: CombinedSurpriseEntry[];
  excluded: string[];
  belowBase: string[];
}

/**
 * Percentile ranks, ascending, with ties sharing their average position.
 */
export function percentileRanks(values: ReadonlyMap<string, number>): Map<string, number> {
  const sorted = [...values].sort((a, b) => a[1] - b[1]);
  const n = sorted.length;
  const ranks = new Map<string, number>();

  let i = 0;
  while (i < n) {
    let j = i;
    while (j + 1 < n && sorted[j + 1][1] === sorted[i][1]) j++;
    const pct = (i + j + 2) / 2 / n;
    for (let k = i; k <= j; k++) ranks.set(sorted[k][0], pct);
    i = j + 1;
  }
  return ranks;
}

// Larger |base| wins a tie, then the larger base, then entity id
function byBase(a: { entityId: string; pbt: number }, b: { entityId: string; pbt: number }): number {
  return Math.abs(b.pbt) - Math.abs(a.pbt) || b.pbt - a.pbt || a.entityId.localeCompare(b.entityId);
}

function meetsBase(pbt: number, minBase: number): boolean {
  return Math.abs(pbt) >= minBase;
}

function toEntry(row: DecompositionRow, growthPct: number): SurpriseEntry {
  return {
    entityId: row.entityId,
    pbt: row.periodValues.pbt,
    growthPct,
    topLineImpact: row.impacts?.topLine ?? null,
    costImpact: row.impacts?.cost ?? null,
    nonRecurringImpact: row.impacts?.nonRecurring ?? null,
    flags: row.flags,
  };
}

export function rankEarningsSurprises(
  rows: readonly DecompositionRow[],
  opts: SurpriseOptions,
): EarningsSurprises {
  const limit = opts.limit ?? DEFAULT_LIMIT;
  const minBase = opts.minBase ?? 0;
  const entries: SurpriseEntry[] = [];
  const excluded: string[] = [];
  const belowBase: string[] = [];

  for (const row of rows) {
    if (row.horizon !== opts.horizon || row.period !== opts.period) continue;
    if (!meetsBase(row.periodValues.pbt, minBase)) belowBase.push(row.entityId);
    else if (row.growthPct === null) excluded.push(row.entityId);
    else entries.push(toEntry(row, row.growthPct));
  }

  const gainers = [...entries].sort((a, b) => b.growthPct - a.growthPct || byBase(a, b)).slice(0, limit);
  const decliners = entries
    .filter((e) => e.growthPct < 0)
    .sort((a, b) => a.growthPct - b.growthPct || byBase(a, b))
    .slice(0, limit);

  return {
    horizon: opts.horizon,
    period: opts.period,
    gainers,
    decliners,
    excluded: excluded.sort(),
    belowBase: belowBase.sort(),
  };
}

/**
 * Rank by the mean of QoQ and YoY growth percentile ranks. Percentiles are
 * taken over every entity reporting the period, before the base filter.
 */
export function rankCombinedSurprises(
  rows: readonly DecompositionRow[],
  opts: CombinedSurpriseOptions,
): CombinedEarningsSurprises {
  const limit = opts.limit ?? DEFAULT_LIMIT;
  const minBase = opts.minBase ?? 0;

  const pbtByEntity = new Map<string, number>();
  const qoq = new Map<string, number>();
  const yoy = new Map<string, number>();
  for (const row of rows) {
    if (row.period !== opts.period) continue;
    if (row.horizon !== "qoq" && row.horizon !== "yoy") continue;
    pbtByEntity.set(row.entityId, row.periodValues.pbt);
    if (row.growthPct !== null) (row.horizon === "qoq" ? qoq : yoy).set(row.entityId, row.growthPct);
  }

  const qoqRanks = percentileRanks(qoq);
  const yoyRanks = percentileRanks(yoy);
  const entries: CombinedSurpriseEntry[] = [];
  const excluded: string[] = [];
  const belowBase: string[] = [];

  for (const [entityId, pbt] of pbtByEntity) {
    if (!meetsBase(pbt, minBase)) {
      belowBase.push(entityId);
      continue;
    }
    const qoqRank = qoqRanks.get(entityId) ?? null;
    const yoyRank = yoyRanks.get(entityId) ?? null;
    const present = [qoqRank, yoyRank].filter((r): r is number => r !== null);
    if (present.length === 0) {
      excluded.push(entityId);
      continue;
    }
    entries.push({
      entityId,
      pbt,
      qoqGrowthPct: qoq.get(entityId) ?? null,
      yoyGrowthPct: yoy.get(entityId) ?? null,
      qoqRank,
      yoyRank,
      combinedScore: present.reduce((sum, r) => sum + r, 0) / present.length,
    });
  }

  const gainers = [...entries].sort((a, b) => b.combinedScore - a.combinedScore || byBase(a, b)).slice(0, limit);
  const decliners = [...entries].sort((a, b) => a.combinedScore - b.combinedScore || byBase(a, b)).slice(0, limit);

  return {
    period: opts.period,
    gainers,
    decliners,
    excluded: excluded.sort(),
    belowBase: belowBase.sort(),
  };
}
