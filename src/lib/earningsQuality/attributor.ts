/**
 * Earnings Quality — Attributor
 *
 * Turns a change vector into scores (percentage points of |Change_PBT|) and
 * impacts (percentage points of GrowthPct).
 *
 * Identities before capping, with denominator = |Change_PBT|:
 *   topLine + cost + nonRecurring = ±100
 *   nii + fee = topLine, opex + provision = cost, loan + margin = nii
 * and therefore topLineImpact + costImpact + nonRecurringImpact = GrowthPct.
 * Flooring or capping can break the first identity; the row records the
 * signed discrepancy instead of hiding it.
 *
 * Pure function — deterministic, no side effects.
 */

import type { Attribution, AttributionConfig, MetricValues, ScoreSet } from "./types";
import { DEFAULT_ATTRIBUTION_CONFIG } from "./config";

export function scoreDenominator(changePbt: number, floor: number): { denominator: number; floored: boolean } {
  const magnitude = Math.abs(changePbt);
  return { denominator: Math.max(magnitude, floor), floored: magnitude < floor };
}

export function computeRawScores(
  change: MetricValues,
  denominator: number,
  loanGrowthPct: number | null,
): ScoreSet {
  const score = (delta: number) => (delta * 100) / denominator;

  const nii = score(change.nii);
  const loan = loanGrowthPct === null ? null : loanGrowthPct / 2;

  return {
    topLine: score(change.coreRevenue),
    cost: score(change.opex + change.provision),
    nonRecurring: score(change.nonRecurring),
    nii,
    fee: score(change.fee),
    opex: score(change.opex),
    provision: score(change.provision),
    loan,
    margin: loan === null ? null : nii - loan,
  };
}

/**
 * Clamp every score independently to [-cap, cap].
 */
export function capScores(raw: ScoreSet, cap: number): { scores: ScoreSet; capped: boolean } {
  let capped = false;
  const clamp = (value: number) => {
    const out = Math.min(cap, Math.max(-cap, value));
    if (out !== value) capped = true;
    return out;
  };
  const clampNullable = (value: number | null) => (value === null ? null : clamp(value));

  const scores: ScoreSet = {
    topLine: clamp(raw.topLine),
    cost: clamp(raw.cost),
    nonRecurring: clamp(raw.nonRecurring),
    nii: clamp(raw.nii),
    fee: clamp(raw.fee),
    opex: clamp(raw.opex),
    provision: clamp(raw.provision),
    loan: clampNullable(raw.loan),
    margin: clampNullable(raw.margin),
  };
  return { scores, capped };
}

export function scoresToImpacts(scores: ScoreSet, growthPct: number): ScoreSet {
  const magnitude = Math.abs(growthPct);
  const impact = (score: number) => (score * magnitude) / 100;
  const impactNullable = (score: number | null) => (score === null ? null : impact(score));

  return {
    topLine: impact(scores.topLine),
    cost: impact(scores.cost),
    nonRecurring: impact(scores.nonRecurring),
    nii: impact(scores.nii),
    fee: impact(scores.fee),
    opex: impact(scores.opex),
    provision: impact(scores.provision),
    loan: impactNullable(scores.loan),
    margin: impactNullable(scores.margin),
  };
}

export function attribute(
  change: MetricValues,
  growthPct: number | null,
  loanGrowthPct: number | null,
  config: AttributionConfig = DEFAULT_ATTRIBUTION_CONFIG,
): Attribution {
  const { denominator, floored } = scoreDenominator(change.pbt, config.scoreFloor);
  const rawScores = computeRawScores(change, denominator, loanGrowthPct);
  const { scores, capped } = capScores(rawScores, config.scoreCap);

  if (growthPct === null) {
    return {
      denominator,
      rawScores,
      scores,
      impacts: null,
      totalImpact: null,
      impactDiscrepancy: null,
      flags: { smallDenominator: floored, capped, impactInconsistent: false },
    };
  }

  const impacts = scoresToImpacts(scores, growthPct);
  const totalImpact = impacts.topLine + impacts.cost + impacts.nonRecurring;
  const impactDiscrepancy = totalImpact - growthPct;

  return {
    denominator,
    rawScores,
    scores,
    impacts,
    totalImpact,
    impactDiscrepancy,
    flags: {
      smallDenominator: floored,
      capped,
      impactInconsistent: Math.abs(impactDiscrepancy) > config.tolerance * Math.max(1, Math.abs(growthPct)),
    },
  };
}
