/**
 * Earnings Quality — Comparison Horizons
 *
 * Each horizon carries its own applicability, basis and prior-lookup rule so
 * the comparator and attributor stay generic. T12M is the primary quarterly
 * horizon and carries no column suffix.
 */

import type { DerivedRecord, HorizonId, MetricValues, PeriodKind, PreparedSeries } from "./types";

export interface ResolvedBasis {
  current: MetricValues | null;
  prior: MetricValues | null;
  priorPeriod: string | null;
}

export interface Horizon {
  id: HorizonId;
  label: string;
  appliesTo: PeriodKind;
  /** Quarters (or years) between the current and the reference period */
  lag: number;
  /** Suffix for flattened columns, "" for the primary horizon of a kind */
  columnSuffix: string;
  resolve(series: PreparedSeries, record: DerivedRecord, byOrdinal: Map<number, DerivedRecord>): ResolvedBasis;
}

function periodLag(id: HorizonId, label: string, appliesTo: PeriodKind, lag: number, columnSuffix: string): Horizon {
  return {
    id,
    label,
    appliesTo,
    lag,
    columnSuffix,
    resolve(_series, record, byOrdinal) {
      const prior = byOrdinal.get(record.ordinal - lag);
      return {
        current: record.values,
        prior: prior?.values ?? null,
        priorPeriod: prior?.period ?? null,
      };
    },
  };
}

const T12M: Horizon = {
  id: "t12m",
  label: "T12M",
  appliesTo: "quarterly",
  lag: 4,
  columnSuffix: "",
  resolve(series, record) {
    const current = series.rolling.get(record.ordinal);
    const prior = series.rolling.get(record.ordinal - 4);
    return {
      current: current?.values ?? null,
      prior: current && prior ? prior.values : null,
      priorPeriod: current && prior ? prior.period : null,
    };
  },
};

export const HORIZONS: Record<HorizonId, Horizon> = {
  t12m: T12M,
  qoq: periodLag("qoq", "QoQ", "quarterly", 1, "_QoQ"),
  yoy: periodLag("yoy", "YoY", "quarterly", 4, "_YoY"),
  annual: periodLag("annual", "Annual", "annual", 1, ""),
};

export const HORIZON_ORDER: readonly HorizonId[] = ["t12m", "qoq", "yoy", "annual"];

export function horizonsFor(kind: PeriodKind, only?: readonly HorizonId[]): Horizon[] {
  return HORIZON_ORDER.filter((id) => !only || only.includes(id))
    .map((id) => HORIZONS[id])
    .filter((h) => h.appliesTo === kind);
}
