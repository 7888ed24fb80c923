/**
 * Earnings Quality — Comparator
 *
 * Pairs a period with its reference period under one horizon and computes
 * absolute changes plus PBT and loan growth. Missing history yields a
 * Comparison with null change fields rather than an error.
 */

import type { Comparison, DerivedRecord, MetricValues, PreparedSeries } from "./types";
import type { Horizon } from "./horizons";
import { growthPercent, mapMetrics } from "./explain";

export function diffMetrics(current: MetricValues, prior: MetricValues): MetricValues {
  return mapMetrics((key) => current[key] - prior[key]);
}

export function indexByOrdinal(series: PreparedSeries): Map<number, DerivedRecord> {
  return new Map(series.records.map((r): [number, DerivedRecord] => [r.ordinal, r]));
}

export function compare(
  series: PreparedSeries,
  record: DerivedRecord,
  horizon: Horizon,
  byOrdinal: Map<number, DerivedRecord> = indexByOrdinal(series),
): Comparison {
  const { current, prior, priorPeriod } = horizon.resolve(series, record, byOrdinal);

  if (!current || !prior) {
    return {
      current,
      prior: null,
      priorPeriod: null,
      change: null,
      growthPct: null,
      loanGrowthPct: null,
    };
  }

  const change = diffMetrics(current, prior);
  return {
    current,
    prior,
    priorPeriod,
    change,
    growthPct: growthPercent(change.pbt, prior.pbt),
    loanGrowthPct: growthPercent(change.loans, prior.loans),
  };
}
