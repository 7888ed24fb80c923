/**
 * Earnings Quality — Explainability Helpers
 *
 * Shared utilities that never coerce a missing value to zero or divide by zero.
 */

import type { MetricKey, MetricValues, RawMetricKey, RawMetrics } from "./types";

export const RAW_METRIC_KEYS: readonly RawMetricKey[] = [
  "toi",
  "pbt",
  "nii",
  "fee",
  "opex",
  "provision",
  "loans",
  "nim",
];

/** Summed over a trailing window; everything else is averaged. */
export const FLOW_METRIC_KEYS: readonly MetricKey[] = [
  "toi",
  "pbt",
  "nii",
  "fee",
  "opex",
  "provision",
  "coreRevenue",
  "coreProfit",
  "nonRecurring",
];

/**
 * Split raw metrics into a complete RawMetrics or the list of missing keys.
 * null, undefined and non-finite values all count as missing.
 */
export function requireRawMetrics(
  metrics: Partial<Record<RawMetricKey, number | null>>,
): { value: RawMetrics; missing: [] } | { value: undefined; missing: RawMetricKey[] } {
  const read = (key: RawMetricKey): number | undefined => {
    const val = metrics[key];
    return typeof val === "number" && Number.isFinite(val) ? val : undefined;
  };
  const missing = RAW_METRIC_KEYS.filter((key) => read(key) === undefined);

  const toi = read("toi");
  const pbt = read("pbt");
  const nii = read("nii");
  const fee = read("fee");
  const opex = read("opex");
  const provision = read("provision");
  const loans = read("loans");
  const nim = read("nim");

  if (
    toi === undefined ||
    pbt === undefined ||
    nii === undefined ||
    fee === undefined ||
    opex === undefined ||
    provision === undefined ||
    loans === undefined ||
    nim === undefined
  ) {
    return { value: undefined, missing };
  }
  return { value: { toi, pbt, nii, fee, opex, provision, loans, nim }, missing: [] };
}

/**
 * change / |base| * 100, or null when the base is zero.
 */
export function growthPercent(change: number, base: number): number | null {
  if (base === 0) return null;
  return (change * 100) / Math.abs(base);
}

export function mapMetrics(fn: (key: MetricKey) => number): MetricValues {
  return {
    toi: fn("toi"),
    pbt: fn("pbt"),
    nii: fn("nii"),
    fee: fn("fee"),
    opex: fn("opex"),
    provision: fn("provision"),
    loans: fn("loans"),
    nim: fn("nim"),
    coreRevenue: fn("coreRevenue"),
    coreProfit: fn("coreProfit"),
    nonRecurring: fn("nonRecurring"),
  };
}
