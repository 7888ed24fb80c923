/**
 * Earnings Quality — Series Preparer
 *
 * One entity, one period kind. Validates ordering, derives core revenue /
 * core profit / non-recurring per period, and builds the trailing-twelve-month
 * index in a single forward pass.
 *
 * Pure function — deterministic, no side effects.
 */

import type {
  DerivedRecord,
  MetricValues,
  PeriodRecord,
  PreparedSeries,
  RawMetrics,
  RollingAggregate,
  SkippedPeriod,
} from "./types";
import { EngineError } from "./errors";
import { FLOW_METRIC_KEYS, mapMetrics, requireRawMetrics } from "./explain";
import { parsePeriodLabel } from "./periods";

const WINDOW = 4;

/**
 * PBT = coreProfit + nonRecurring holds exactly by construction.
 */
export function deriveMetrics(raw: RawMetrics): MetricValues {
  const coreRevenue = raw.nii + raw.fee;
  const coreProfit = coreRevenue + raw.opex + raw.provision;
  return {
    ...raw,
    coreRevenue,
    coreProfit,
    nonRecurring: raw.pbt - coreProfit,
  };
}

/**
 * Sum flow metrics, average stock and ratio metrics (loans, NIM).
 */
export function aggregateWindow(window: readonly MetricValues[]): MetricValues {
  const flow = new Set(FLOW_METRIC_KEYS);
  return mapMetrics((key) => {
    let total = 0;
    for (const values of window) total += values[key];
    return flow.has(key) ? total : total / window.length;
  });
}

function assertSeriesShape(records: readonly PeriodRecord[]): number[] {
  const first = records[0];
  const ordinals: number[] = [];

  for (const record of records) {
    if (record.entityId !== first.entityId) {
      throw new EngineError("INVALID_SERIES", `Series mixes entities ${first.entityId} and ${record.entityId}`, {
        entityId: first.entityId,
      });
    }
    if (record.periodKind !== first.periodKind) {
      throw new EngineError("INVALID_SERIES", `Series for ${first.entityId} mixes period kinds`, {
        entityId: first.entityId,
      });
    }

    const { ordinal } = parsePeriodLabel(record.periodKind, record.period);
    const prev = ordinals[ordinals.length - 1];
    if (prev !== undefined && ordinal <= prev) {
      throw new EngineError(
        "INVALID_SERIES",
        ordinal === prev
          ? `Duplicate period ${record.period} for ${record.entityId}`
          : `Period ${record.period} for ${record.entityId} is out of order`,
        { entityId: record.entityId, period: record.period },
      );
    }
    ordinals.push(ordinal);
  }

  return ordinals;
}

/**
 * Trailing-twelve-month aggregates keyed by ordinal. A window only forms over
 * four consecutive quarters, so any gap voids the next three aggregates.
 */
export function buildRollingIndex(records: readonly DerivedRecord[]): Map<number, RollingAggregate> {
  const index = new Map<number, RollingAggregate>();
  let window: DerivedRecord[] = [];

  for (const record of records) {
    const last = window[window.length - 1];
    if (last && record.ordinal !== last.ordinal + 1) window = [];
    window.push(record);
    if (window.length > WINDOW) window.shift();

    if (window.length === WINDOW) {
      index.set(record.ordinal, {
        period: record.period,
        ordinal: record.ordinal,
        values: aggregateWindow(window.map((r) => r.values)),
      });
    }
  }

  return index;
}

export function prepareSeries(records: readonly PeriodRecord[]): PreparedSeries {
  if (records.length === 0) {
    throw new EngineError("INVALID_SERIES", "Cannot prepare an empty series");
  }

  const ordinals = assertSeriesShape(records);
  const { entityId, periodKind } = records[0];
  const derived: DerivedRecord[] = [];
  const skipped: SkippedPeriod[] = [];

  records.forEach((record, i) => {
    const raw = requireRawMetrics(record.metrics);
    if (raw.value === undefined) {
      skipped.push({ entityId, periodKind, period: record.period, missingFields: raw.missing });
      return;
    }
    derived.push({
      entityId,
      periodKind,
      period: record.period,
      ordinal: ordinals[i],
      values: deriveMetrics(raw.value),
    });
  });

  return {
    entityId,
    periodKind,
    records: derived,
    rolling: periodKind === "quarterly" ? buildRollingIndex(derived) : new Map<number, RollingAggregate>(),
    skipped,
  };
}
