/**
 * Earnings Quality — Driver
 *
 * Orchestrates series preparation → comparison → attribution per entity
 * series and assembles DecompositionRows. Series are independent: a failing
 * series is logged and reported, the rest still produce rows.
 */

import type {
  AttributionConfig,
  DecompositionRow,
  DecompositionRunResult,
  EntityFailure,
  HorizonId,
  PeriodKind,
  PeriodRecord,
  SkippedPeriod,
} from "./types";
import { resolveAttributionConfig } from "./config";
import { classifyEngineError } from "./errors";
import { parsePeriodLabel, resolveAsOfOrdinal } from "./periods";
import { prepareSeries } from "./seriesPreparer";
import { compare, indexByOrdinal } from "./comparator";
import { attribute } from "./attributor";
import { horizonsFor } from "./horizons";

export type EngineLogger = Pick<Console, "info" | "warn">;

export interface DecomposeOptions {
  config?: Partial<AttributionConfig>;
  /** Restrict output to these horizons (default: all that apply) */
  horizons?: readonly HorizonId[];
  /** Evaluation point; records after it are ignored */
  asOf?: string;
  logger?: EngineLogger;
}

export interface EntityDecomposition {
  rows: DecompositionRow[];
  skipped: SkippedPeriod[];
}

const NO_FLAGS = { smallDenominator: false, capped: false, impactInconsistent: false } as const;

function applyAsOf(records: readonly PeriodRecord[], asOf: string | undefined): readonly PeriodRecord[] {
  if (!asOf || records.length === 0) return records;
  const kind = records[0].periodKind;
  const limit = resolveAsOfOrdinal(kind, asOf);
  return records.filter((r) => parsePeriodLabel(kind, r.period).ordinal <= limit);
}

function decomposeWithConfig(
  records: readonly PeriodRecord[],
  config: AttributionConfig,
  opts: DecomposeOptions,
): EntityDecomposition {
  const scoped = applyAsOf(records, opts.asOf);
  if (scoped.length === 0) return { rows: [], skipped: [] };

  const series = prepareSeries(scoped);
  const byOrdinal = indexByOrdinal(series);
  const horizons = horizonsFor(series.periodKind, opts.horizons);
  const rows: DecompositionRow[] = [];

  for (const record of series.records) {
    for (const horizon of horizons) {
      const comparison = compare(series, record, horizon, byOrdinal);
      const base = {
        entityId: series.entityId,
        horizon: horizon.id,
        periodKind: series.periodKind,
        period: record.period,
        periodValues: record.values,
        ...comparison,
      };

      if (!comparison.change) {
        rows.push({
          ...base,
          rawScores: null,
          scores: null,
          impacts: null,
          totalImpact: null,
          impactDiscrepancy: null,
          flags: { ...NO_FLAGS },
        });
        continue;
      }

      const attribution = attribute(comparison.change, comparison.growthPct, comparison.loanGrowthPct, config);
      rows.push({
        ...base,
        rawScores: attribution.rawScores,
        scores: attribution.scores,
        impacts: attribution.impacts,
        totalImpact: attribution.totalImpact,
        impactDiscrepancy: attribution.impactDiscrepancy,
        flags: attribution.flags,
      });
    }
  }

  return { rows, skipped: series.skipped };
}

/**
 * Decompose one (entity, period kind) series.
 *
 * Throws EngineError on precondition violations (mixed entities or kinds,
 * duplicate or out-of-order periods, bad labels).
 */
export function decomposeEntitySeries(
  records: readonly PeriodRecord[],
  opts: DecomposeOptions = {},
): EntityDecomposition {
  return decomposeWithConfig(records, resolveAttributionConfig(opts.config), opts);
}

function groupSeries(records: readonly PeriodRecord[]): PeriodRecord[][] {
  const groups = new Map<string, PeriodRecord[]>();
  for (const record of records) {
    const key = `${record.entityId}\u0000${record.periodKind}`;
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }
  return [...groups.values()];
}

/**
 * Decompose every entity series in a flat record list.
 *
 * Records are grouped by (entity, period kind) in first-seen order; order
 * within a group is preserved and must already be chronological.
 */
export function runDecomposition(
  records: readonly PeriodRecord[],
  opts: DecomposeOptions = {},
): DecompositionRunResult {
  const config = resolveAttributionConfig(opts.config);
  const logger = opts.logger ?? console;
  const rows: DecompositionRow[] = [];
  const skipped: SkippedPeriod[] = [];
  const failures: EntityFailure[] = [];
  const groups = groupSeries(records);

  for (const group of groups) {
    const { entityId, periodKind } = group[0];
    try {
      const result = decomposeWithConfig(group, config, opts);
      rows.push(...result.rows);
      skipped.push(...result.skipped);
      for (const s of result.skipped) {
        logger.warn(
          `[earningsQuality] skipped ${entityId} ${s.period}: missing ${s.missingFields.join(", ")}`,
        );
      }
    } catch (err) {
      const failure = toFailure(entityId, periodKind, err);
      failures.push(failure);
      logger.warn(`[earningsQuality] series failed ${entityId} (${periodKind}): ${failure.code} ${failure.message}`);
    }
  }

  const summary = {
    series: groups.length,
    rows: rows.length,
    comparableRows: rows.filter((r) => r.change !== null).length,
    skippedPeriods: skipped.length,
    failedSeries: failures.length,
  };
  logger.info(
    `[earningsQuality] decomposed ${summary.series} series → ${summary.rows} rows ` +
      `(${summary.comparableRows} comparable, ${summary.skippedPeriods} skipped periods, ${summary.failedSeries} failed series)`,
  );

  return { rows, skipped, failures, summary };
}

function toFailure(entityId: string, periodKind: PeriodKind, err: unknown): EntityFailure {
  return {
    entityId,
    periodKind,
    code: classifyEngineError(err),
    message: err instanceof Error ? err.message : String(err),
  };
}
