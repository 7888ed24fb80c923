/**
 * Earnings Quality — Period Labels
 *
 * Quarterly labels are "YYYYQn", annual labels "YYYY". Lag lookups use the
 * ordinal, so a missing quarter is a gap rather than a shifted neighbour.
 */

import type { ParsedPeriod, PeriodKind } from "./types";
import { EngineError } from "./errors";

const QUARTER_RE = /^(\d{4})Q([1-4])$/;
const YEAR_RE = /^\d{4}$/;
const MIN_YEAR = 1900;

export function parsePeriodLabel(kind: PeriodKind, label: string): ParsedPeriod {
  if (kind === "quarterly") {
    const match = QUARTER_RE.exec(label);
    if (!match) {
      throw new EngineError("INVALID_PERIOD_LABEL", `Invalid quarter label: ${label}`, { kind, label });
    }
    const year = Number(match[1]);
    const quarter = Number(match[2]);
    return { year, quarter, ordinal: year * 4 + (quarter - 1) };
  }

  if (!YEAR_RE.test(label)) {
    throw new EngineError("INVALID_PERIOD_LABEL", `Invalid year label: ${label}`, { kind, label });
  }
  const year = Number(label);
  return { year, ordinal: year };
}

export function formatPeriodLabel(kind: PeriodKind, ordinal: number): string {
  if (kind === "annual") return String(ordinal);
  const year = Math.floor(ordinal / 4);
  const quarter = ordinal - year * 4 + 1;
  return `${year}Q${quarter}`;
}

/**
 * Shift a label back by `offset` periods (negative shifts forward).
 * Returns undefined for anything before 1900.
 */
export function shiftPeriodLabel(
  kind: PeriodKind,
  label: string,
  offset: number,
): string | undefined {
  const { ordinal } = parsePeriodLabel(kind, label);
  const shifted = ordinal - offset;
  const year = kind === "quarterly" ? Math.floor(shifted / 4) : shifted;
  if (year < MIN_YEAR) return undefined;
  return formatPeriodLabel(kind, shifted);
}

export function sortPeriodLabels(
  labels: Iterable<string>,
  kind: PeriodKind,
  descending = true,
): string[] {
  const keyed = [...labels].map((label) => ({ label, ordinal: parsePeriodLabel(kind, label).ordinal }));
  keyed.sort((a, b) => (descending ? b.ordinal - a.ordinal : a.ordinal - b.ordinal));
  return keyed.map((k) => k.label);
}

/**
 * Resolve an evaluation-point label against a series kind.
 * "YYYY" on a quarterly series means its fourth quarter; "YYYYQn" on an
 * annual series means year YYYY.
 */
export function resolveAsOfOrdinal(kind: PeriodKind, asOf: string): number {
  if (kind === "quarterly") {
    if (YEAR_RE.test(asOf)) return Number(asOf) * 4 + 3;
    return parsePeriodLabel("quarterly", asOf).ordinal;
  }
  if (QUARTER_RE.test(asOf)) return parsePeriodLabel("quarterly", asOf).year;
  return parsePeriodLabel("annual", asOf).ordinal;
}
