/**
 * Earnings Decomposition
 *
 * Reads a JSON array of period records (one object per entity per period),
 * runs the earnings-quality decomposition and writes the rows as JSON.
 *
 * READ-ONLY — never writes to any store; output goes to stdout or --out.
 *
 * Usage:
 *   npx tsx scripts/decomposeEarnings.ts records.json
 *   npx tsx scripts/decomposeEarnings.ts records.json --as-of 2024Q4 --flat
 *   npx tsx scripts/decomposeEarnings.ts records.json --out rows.json
 *   npx tsx scripts/decomposeEarnings.ts --help
 *
 * Optional env vars:
 *   EARNINGS_SCORE_FLOOR, EARNINGS_SCORE_CAP, EARNINGS_IDENTITY_TOLERANCE
 */

import { readFileSync, writeFileSync } from "node:fs";
import {
  flattenDecompositionRow,
  loadAttributionConfigFromEnv,
  parsePeriodRecords,
  runDecomposition,
} from "@/lib/earningsQuality";

// ─── CLI arg parsing ─────────────────────────────────────────────────────────

interface CliArgs {
  input: string | undefined;
  out: string | undefined;
  asOf: string | undefined;
  flat: boolean;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { input: undefined, out: undefined, asOf: undefined, flat: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--flat") {
      args.flat = true;
    } else if (arg === "--out" || arg === "--as-of") {
      const val = argv[i + 1];
      if (!val || val.startsWith("--")) {
        console.error(`[decomposeEarnings] Missing value for ${arg}`);
        process.exit(1);
      }
      if (arg === "--out") args.out = val;
      else args.asOf = val;
      i++;
    } else if (!args.input) {
      args.input = arg;
    } else {
      console.error(`[decomposeEarnings] Unexpected argument: ${arg}`);
      process.exit(1);
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Earnings Decomposition
======================
Decomposes PBT growth into top-line, cost and non-recurring contributions
for every entity series in a JSON file of period records.

Usage:
  npx tsx scripts/decomposeEarnings.ts <records.json> [options]

Options:
  --as-of LABEL  Ignore periods after LABEL (e.g. 2024Q4 or 2024)
  --out FILE     Write JSON to FILE instead of stdout
  --flat         Emit flat column records instead of nested rows
  --help         Show this help text
`);
}

// ─── Main ────────────────────────────────────────────────────────────────────

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || !args.input) {
    printHelp();
    process.exit(args.help ? 0 : 1);
  }

  const records = parsePeriodRecords(JSON.parse(readFileSync(args.input, "utf8")));
  const config = loadAttributionConfigFromEnv();
  // stdout carries the JSON payload, so engine logs go to stderr
  const logger = { info: console.error, warn: console.warn };
  const result = runDecomposition(records, { config, asOf: args.asOf, logger });

  const payload = {
    summary: result.summary,
    failures: result.failures,
    skipped: result.skipped,
    rows: args.flat ? result.rows.map(flattenDecompositionRow) : result.rows,
  };
  const json = JSON.stringify(payload, null, 2);

  if (args.out) {
    writeFileSync(args.out, json + "\n");
    console.error(`[decomposeEarnings] wrote ${result.rows.length} rows to ${args.out}`);
  } else {
    process.stdout.write(json + "\n");
  }

  if (result.failures.length > 0) process.exitCode = 2;
}

try {
  main();
} catch (err) {
  console.error("[decomposeEarnings] failed:", err instanceof Error ? err.message : err);
  process.exit(1);
}
