/**
 * Flattening Tests
 *
 * Run: node --import tsx --test src/lib/earningsQuality/__tests__/flatten.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { decompositionRowKey, flattenDecompositionRow, widenDecompositionRows } from "../flatten";
import { runDecomposition } from "../driver";
import type { DecompositionRow } from "../types";
import { BASE_QUARTER, GROWTH_QUARTER, bankRecord, silentLogger } from "./fixtures/records";

function twoQuarterRows(): DecompositionRow[] {
  return runDecomposition([bankRecord("X", "2024Q1", BASE_QUARTER), bankRecord("X", "2024Q2", GROWTH_QUARTER)], {
    logger: silentLogger().logger,
  }).rows;
}

describe("Flat columns", () => {
  it("keys rows by entity, horizon and period", () => {
    const keys = twoQuarterRows().map(decompositionRowKey);
    assert.deepEqual(keys, [
      "X|t12m|2024Q1",
      "X|qoq|2024Q1",
      "X|yoy|2024Q1",
      "X|t12m|2024Q2",
      "X|qoq|2024Q2",
      "X|yoy|2024Q2",
    ]);
    assert.equal(new Set(keys).size, keys.length);
  });

  it("suffixes QoQ columns", () => {
    const qoq = twoQuarterRows().find((r) => r.horizon === "qoq" && r.period === "2024Q2");
    assert.ok(qoq);
    const flat = flattenDecompositionRow(qoq);

    assert.equal(flat.Entity, "X");
    assert.equal(flat.Horizon, "QoQ");
    assert.equal(flat.Period, "2024Q2");
    assert.equal(flat.PBT_QoQ, 120);
    assert.equal(flat.PBT_Prior_QoQ, 100);
    assert.equal(flat.PBT_Change_QoQ, 20);
    assert.equal(flat.PriorPeriod_QoQ, "2024Q1");
    assert.equal(flat.GrowthPct_QoQ, 20);
    assert.equal(flat.TopLineScore_QoQ, 80);
    assert.equal(flat.NonRecImpact_QoQ, -2);
    assert.equal(flat.TotalImpact_QoQ, 20);
    assert.equal(flat.CapFlag_QoQ, false);
    assert.equal("GrowthPct" in flat, false);
  });

  it("leaves T12M unsuffixed and nulls missing comparisons", () => {
    const t12m = twoQuarterRows().find((r) => r.horizon === "t12m" && r.period === "2024Q2");
    assert.ok(t12m);
    const flat = flattenDecompositionRow(t12m);

    assert.equal(flat.Horizon, "T12M");
    assert.equal(flat.PBT, null);
    assert.equal(flat.GrowthPct, null);
    assert.equal(flat.TopLineScore, null);
    assert.equal(flat.SmallDenomFlag, false);
  });

  it("widens all horizons of a period into one record", () => {
    const wide = widenDecompositionRows(twoQuarterRows());
    assert.equal(wide.length, 2);
    assert.equal(wide[1].Entity, "X");
    assert.equal(wide[1].PeriodKind, "quarterly");
    assert.equal(wide[1].Period, "2024Q2");
    assert.equal(wide[1].GrowthPct_QoQ, 20);
    assert.equal(wide[1].GrowthPct_YoY, null);
    assert.equal(wide[1].GrowthPct, null);
  });
});
