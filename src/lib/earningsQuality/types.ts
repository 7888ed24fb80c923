/**
 * Earnings Quality — Shared Types
 *
 * Bank-level PBT growth decomposition: series preparation, multi-horizon
 * comparison, and score/impact attribution.
 *
 * All values are in the single monetary unit of the input series.
 */

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export type PeriodKind = "quarterly" | "annual";

/** Raw metric keys carried on every PeriodRecord. Expense metrics are negative. */
export type RawMetricKey =
  | "toi"
  | "pbt"
  | "nii"
  | "fee"
  | "opex"
  | "provision"
  | "loans"
  | "nim";

export type RawMetrics = Record<RawMetricKey, number>;

export interface PeriodRecord {
  entityId: string;
  periodKind: PeriodKind;
  /** "2024Q3" for quarterly, "2024" for annual */
  period: string;
  metrics: Partial<Record<RawMetricKey, number | null>>;
}

// ---------------------------------------------------------------------------
// Derived series
// ---------------------------------------------------------------------------

export type DerivedMetricKey = "coreRevenue" | "coreProfit" | "nonRecurring";

export type MetricKey = RawMetricKey | DerivedMetricKey;

export type MetricValues = Record<MetricKey, number>;

export interface ParsedPeriod {
  year: number;
  /** 1..4, quarterly only */
  quarter?: number;
  /** Lag arithmetic key: year * 4 + (quarter - 1) for quarters, year for years */
  ordinal: number;
}

export interface DerivedRecord {
  entityId: string;
  periodKind: PeriodKind;
  period: string;
  ordinal: number;
  values: MetricValues;
}

export interface RollingAggregate {
  period: string;
  ordinal: number;
  values: MetricValues;
}

export interface SkippedPeriod {
  entityId: string;
  periodKind: PeriodKind;
  period: string;
  missingFields: RawMetricKey[];
}

export interface PreparedSeries {
  entityId: string;
  periodKind: PeriodKind;
  records: DerivedRecord[];
  /** Ordinal → trailing-twelve-month aggregate. Quarterly series only. */
  rolling: Map<number, RollingAggregate>;
  skipped: SkippedPeriod[];
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

export type HorizonId = "t12m" | "qoq" | "yoy" | "annual";

export interface Comparison {
  /** Basis values for the current period (TTM aggregate for t12m) */
  current: MetricValues | null;
  /** Basis values for the reference period */
  prior: MetricValues | null;
  priorPeriod: string | null;
  change: MetricValues | null;
  /** Change_PBT / |Prior_PBT| * 100; null without history or with zero prior PBT */
  growthPct: number | null;
  /** Loan-balance growth in percent, null when the prior balance is zero */
  loanGrowthPct: number | null;
}

// ---------------------------------------------------------------------------
// Attribution
// ---------------------------------------------------------------------------

export interface AttributionConfig {
  /** Minimum |Change_PBT| used as the score denominator */
  scoreFloor: number;
  /** Scores are clamped to [-scoreCap, scoreCap] */
  scoreCap: number;
  /** Relative tolerance for the impact/growth identity check */
  tolerance: number;
}

export type ScoreKey =
  | "topLine"
  | "cost"
  | "nonRecurring"
  | "nii"
  | "fee"
  | "opex"
  | "provision"
  | "loan"
  | "margin";

/** loan/margin are null when loan growth is unavailable */
export type ScoreSet = Record<Exclude<ScoreKey, "loan" | "margin">, number> & {
  loan: number | null;
  margin: number | null;
};

export interface AttributionFlags {
  smallDenominator: boolean;
  capped: boolean;
  impactInconsistent: boolean;
}

export interface Attribution {
  denominator: number;
  rawScores: ScoreSet;
  scores: ScoreSet;
  /** null when growthPct is null */
  impacts: ScoreSet | null;
  totalImpact: number | null;
  /** totalImpact - growthPct */
  impactDiscrepancy: number | null;
  flags: AttributionFlags;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface DecompositionRow {
  entityId: string;
  horizon: HorizonId;
  periodKind: PeriodKind;
  period: string;
  /** The period's own (single-period) values, always present */
  periodValues: MetricValues;
  current: MetricValues | null;
  prior: MetricValues | null;
  priorPeriod: string | null;
  change: MetricValues | null;
  growthPct: number | null;
  loanGrowthPct: number | null;
  rawScores: ScoreSet | null;
  scores: ScoreSet | null;
  impacts: ScoreSet | null;
  totalImpact: number | null;
  impactDiscrepancy: number | null;
  flags: AttributionFlags;
}

export interface EntityFailure {
  entityId: string;
  periodKind: PeriodKind;
  code: import("./errors").EngineErrorCode;
  message: string;
}

export interface DecompositionRunSummary {
  series: number;
  rows: number;
  comparableRows: number;
  skippedPeriods: number;
  failedSeries: number;
}

export interface DecompositionRunResult {
  rows: DecompositionRow[];
  skipped: SkippedPeriod[];
  failures: EntityFailure[];
  summary: DecompositionRunSummary;
}
