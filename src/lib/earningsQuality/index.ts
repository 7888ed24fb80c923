/**
 * Earnings Quality — Integration Entrypoint
 *
 * Single function: runDecomposition()
 * Orchestrates series preparation → horizon comparison → attribution.
 *
 * No I/O: consumes clean PeriodRecords, returns DecompositionRows.
 */

// Re-export all types for consumer convenience
export type {
  Attribution,
  AttributionConfig,
  AttributionFlags,
  Comparison,
  DecompositionRow,
  DecompositionRunResult,
  DecompositionRunSummary,
  DerivedRecord,
  EntityFailure,
  HorizonId,
  MetricKey,
  MetricValues,
  ParsedPeriod,
  PeriodKind,
  PeriodRecord,
  PreparedSeries,
  RawMetricKey,
  RawMetrics,
  RollingAggregate,
  ScoreKey,
  ScoreSet,
  SkippedPeriod,
} from "./types";
export type { EngineErrorCode } from "./errors";
export type { Horizon } from "./horizons";
export type { DecomposeOptions, EngineLogger, EntityDecomposition } from "./driver";
export type { FlatRow, FlatValue } from "./flatten";
export type {
  CombinedEarningsSurprises,
  CombinedSurpriseEntry,
  CombinedSurpriseOptions,
  EarningsSurprises,
  SurpriseEntry,
  SurpriseOptions,
} from "./surprises";

// Re-export sub-modules for direct access
export { EngineError, classifyEngineError } from "./errors";
export {
  DEFAULT_ATTRIBUTION_CONFIG,
  AttributionConfigSchema,
  resolveAttributionConfig,
  loadAttributionConfigFromEnv,
} from "./config";
export { PeriodRecordSchema, parsePeriodRecords } from "./schemas";
export { parsePeriodLabel, formatPeriodLabel, shiftPeriodLabel, sortPeriodLabels } from "./periods";
export { prepareSeries, deriveMetrics, buildRollingIndex } from "./seriesPreparer";
export { HORIZONS, horizonsFor } from "./horizons";
export { compare } from "./comparator";
export { attribute, computeRawScores, capScores } from "./attributor";
export { decomposeEntitySeries, runDecomposition } from "./driver";
export {
  decompositionRowKey,
  flattenDecompositionRow,
  widenDecompositionRows,
} from "./flatten";
export { percentileRanks, rankCombinedSurprises, rankEarningsSurprises } from "./surprises";
