/**
 * Driver Tests
 *
 * End-to-end decomposition, history gating per horizon, evaluation point,
 * per-series failure isolation, logging and determinism.
 *
 * Run: node --import tsx --test src/lib/earningsQuality/__tests__/driver.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { decomposeEntitySeries, runDecomposition } from "../driver";
import { EngineError } from "../errors";
import type { DecompositionRow, HorizonId, PeriodRecord } from "../types";
import { BASE_QUARTER, GROWTH_QUARTER, QUARTERS_2022_2024, bankRecord, silentLogger } from "./fixtures/records";

function rowFor(rows: DecompositionRow[], horizon: HorizonId, period: string): DecompositionRow {
  const row = rows.find((r) => r.horizon === horizon && r.period === period);
  assert.ok(row, `no ${horizon} row for ${period}`);
  return row;
}

describe("End-to-end decomposition", () => {
  it("entity X: +16 core revenue, +6 cost, −2 non-recurring on PBT 100", () => {
    const { logger } = silentLogger();
    const result = runDecomposition(
      [bankRecord("X", "2024Q1", BASE_QUARTER), bankRecord("X", "2024Q2", GROWTH_QUARTER)],
      { logger },
    );
    const row = rowFor(result.rows, "qoq", "2024Q2");

    assert.equal(row.entityId, "X");
    assert.equal(row.periodKind, "quarterly");
    assert.equal(row.priorPeriod, "2024Q1");
    assert.equal(row.change?.pbt, 20);
    assert.equal(row.growthPct, 20);
    assert.equal(row.scores?.topLine, 80);
    assert.equal(row.scores?.cost, 30);
    assert.equal(row.scores?.nonRecurring, -10);
    assert.equal(row.impacts?.topLine, 16);
    assert.equal(row.impacts?.cost, 6);
    assert.equal(row.impacts?.nonRecurring, -2);
    assert.equal(row.totalImpact, 20);
    assert.deepEqual(row.flags, { smallDenominator: false, capped: false, impactInconsistent: false });
  });

  it("emits rows without history carrying identification and period values", () => {
    const { logger } = silentLogger();
    const result = runDecomposition([bankRecord("X", "2024Q1", BASE_QUARTER)], { logger });

    assert.deepEqual(
      result.rows.map((r) => r.horizon),
      ["t12m", "qoq", "yoy"],
    );
    for (const row of result.rows) {
      assert.equal(row.period, "2024Q1");
      assert.equal(row.periodValues.pbt, 100);
      assert.equal(row.change, null);
      assert.equal(row.growthPct, null);
      assert.equal(row.scores, null);
      assert.equal(row.impacts, null);
      assert.equal(row.flags.capped, false);
    }
    assert.equal(rowFor(result.rows, "qoq", "2024Q1").current?.pbt, 100);
    assert.equal(rowFor(result.rows, "t12m", "2024Q1").current, null);
  });
});

describe("History gating", () => {
  it("QoQ from period 2, YoY from period 5, T12M once both windows exist", () => {
    // metric magnitudes vary wildly; gating must depend on history only
    const records = QUARTERS_2022_2024.map((p, i) =>
      bankRecord("G", p, { nii: 100 + i * 1_000, fee: 10 * i, opex: -50, provision: -5 * i, nonRecurring: i % 2 ? 900 : -900 }),
    );
    const { logger } = silentLogger();
    const { rows } = runDecomposition(records, { logger });

    const firstComparable = (horizon: HorizonId) =>
      QUARTERS_2022_2024.findIndex((p) => rowFor(rows, horizon, p).change !== null) + 1;
    const comparable = (horizon: HorizonId) =>
      QUARTERS_2022_2024.filter((p) => rowFor(rows, horizon, p).change !== null).length;

    assert.equal(firstComparable("qoq"), 2);
    assert.equal(firstComparable("yoy"), 5);
    assert.equal(firstComparable("t12m"), 8);
    assert.equal(comparable("qoq"), 8);
    assert.equal(comparable("yoy"), 5);
    assert.equal(comparable("t12m"), 2);
  });

  it("annual series need one prior year and never emit quarterly horizons", () => {
    const { logger } = silentLogger();
    const { rows } = runDecomposition(
      [bankRecord("A", "2022", BASE_QUARTER), bankRecord("A", "2023", GROWTH_QUARTER)],
      { logger },
    );
    assert.deepEqual(
      rows.map((r) => [r.horizon, r.period, r.growthPct]),
      [
        ["annual", "2022", null],
        ["annual", "2023", 20],
      ],
    );
  });
});

describe("Options", () => {
  it("asOf drops later periods", () => {
    const records = QUARTERS_2022_2024.map((p) => bankRecord("X", p, BASE_QUARTER));
    const { rows } = decomposeEntitySeries(records, { asOf: "2022Q3", horizons: ["qoq"] });
    assert.deepEqual(
      rows.map((r) => r.period),
      ["2022Q1", "2022Q2", "2022Q3"],
    );
  });

  it("a bare year as asOf means its fourth quarter", () => {
    const records = QUARTERS_2022_2024.map((p) => bankRecord("X", p, BASE_QUARTER));
    const { rows } = decomposeEntitySeries(records, { asOf: "2023", horizons: ["qoq"] });
    assert.equal(rows[rows.length - 1].period, "2023Q4");
  });

  it("config overrides reach the attributor", () => {
    const { rows } = decomposeEntitySeries(
      [bankRecord("X", "2024Q1", BASE_QUARTER), bankRecord("X", "2024Q2", GROWTH_QUARTER)],
      { horizons: ["qoq"], config: { scoreFloor: 40 } },
    );
    const row = rowFor(rows, "qoq", "2024Q2");
    assert.equal(row.flags.smallDenominator, true);
    assert.equal(row.scores?.topLine, 40);
  });

  it("an invalid config throws before any series runs", () => {
    assert.throws(
      () => runDecomposition([], { config: { scoreCap: -1 } }),
      (err: unknown) => err instanceof EngineError && err.code === "INVALID_CONFIG",
    );
  });

  it("decomposeEntitySeries throws precondition violations", () => {
    assert.throws(
      () => decomposeEntitySeries([bankRecord("X", "2024Q2", BASE_QUARTER), bankRecord("X", "2024Q1", BASE_QUARTER)]),
      (err: unknown) => err instanceof EngineError && err.code === "INVALID_SERIES",
    );
  });
});

describe("runDecomposition", () => {
  it("isolates a failing series and keeps the rest", () => {
    const { logger, warn } = silentLogger();
    const records: PeriodRecord[] = [
      bankRecord("BAD", "2024Q1", BASE_QUARTER),
      bankRecord("X", "2024Q1", BASE_QUARTER),
      bankRecord("BAD", "2024Q1", GROWTH_QUARTER),
      bankRecord("X", "2024Q2", GROWTH_QUARTER),
    ];
    const result = runDecomposition(records, { logger, horizons: ["qoq"] });

    assert.deepEqual(result.failures, [
      { entityId: "BAD", periodKind: "quarterly", code: "INVALID_SERIES", message: "Duplicate period 2024Q1 for BAD" },
    ]);
    assert.deepEqual(
      result.rows.map((r) => `${r.entityId}:${r.period}`),
      ["X:2024Q1", "X:2024Q2"],
    );
    assert.deepEqual(warn, [
      "[earningsQuality] series failed BAD (quarterly): INVALID_SERIES Duplicate period 2024Q1 for BAD",
    ]);
  });

  it("treats quarterly and annual series of one entity independently", () => {
    const { logger } = silentLogger();
    const result = runDecomposition(
      [
        bankRecord("X", "2024Q1", BASE_QUARTER),
        bankRecord("X", "2023", BASE_QUARTER),
        bankRecord("X", "2024Q2", GROWTH_QUARTER),
        bankRecord("X", "2024", GROWTH_QUARTER),
      ],
      { logger, horizons: ["qoq", "annual"] },
    );
    assert.deepEqual(
      result.rows.map((r) => `${r.horizon}:${r.period}:${r.growthPct}`),
      ["qoq:2024Q1:null", "qoq:2024Q2:20", "annual:2023:null", "annual:2024:20"],
    );
  });

  it("reports and logs skipped periods", () => {
    const { logger, warn, info } = silentLogger();
    const broken = bankRecord("X", "2024Q2", GROWTH_QUARTER);
    const result = runDecomposition(
      [
        bankRecord("X", "2024Q1", BASE_QUARTER),
        { ...broken, metrics: { ...broken.metrics, provision: null } },
        bankRecord("X", "2024Q3", GROWTH_QUARTER),
      ],
      { logger, horizons: ["qoq"] },
    );

    assert.deepEqual(result.skipped, [
      { entityId: "X", periodKind: "quarterly", period: "2024Q2", missingFields: ["provision"] },
    ]);
    assert.deepEqual(warn, ["[earningsQuality] skipped X 2024Q2: missing provision"]);
    // 2024Q3 has no 2024Q2 to compare against
    assert.equal(rowFor(result.rows, "qoq", "2024Q3").change, null);
    assert.deepEqual(result.summary, {
      series: 1,
      rows: 2,
      comparableRows: 0,
      skippedPeriods: 1,
      failedSeries: 0,
    });
    assert.deepEqual(info, [
      "[earningsQuality] decomposed 1 series → 2 rows (0 comparable, 1 skipped periods, 0 failed series)",
    ]);
  });

  it("is deterministic", () => {
    const records = QUARTERS_2022_2024.map((p, i) =>
      bankRecord("D", p, { nii: 100 + 7 * i, fee: 20 + i, opex: -40 - i, provision: -10, nonRecurring: 3 * i }),
    );
    const a = runDecomposition(records, { logger: silentLogger().logger });
    const b = runDecomposition(records, { logger: silentLogger().logger });
    assert.deepEqual(a, b);
  });

  it("rows satisfy the exact-sum identity whenever unflagged", () => {
    const records = QUARTERS_2022_2024.map((p, i) =>
      bankRecord("S", p, {
        nii: 300 + 37 * i * (i % 3 === 0 ? -1 : 1),
        fee: 60 + 11 * i,
        opex: -120 - 9 * i,
        provision: -40 + 13 * (i % 2),
        nonRecurring: 25 * ((i % 4) - 1),
        loans: 5_000 + 150 * i,
      }),
    );
    const { rows } = runDecomposition(records, { logger: silentLogger().logger });
    const checked = rows.filter(
      (r) => r.totalImpact !== null && r.growthPct !== null && !r.flags.smallDenominator && !r.flags.capped,
    );

    assert.ok(checked.length > 0);
    for (const row of checked) {
      assert.ok(row.totalImpact !== null && row.growthPct !== null);
      assert.ok(
        Math.abs(row.totalImpact - row.growthPct) <= 1e-6 * Math.max(1, Math.abs(row.growthPct)),
        `${row.horizon} ${row.period}: ${row.totalImpact} vs ${row.growthPct}`,
      );
      assert.equal(row.flags.impactInconsistent, false);
    }
  });
});
