#!/usr/bin/env node
import crypto from "node:crypto";
import { Command, InvalidArgumentError } from "commander";
import type { CommitteeConfig } from "../config/types.committee.js";
import { loadConfig, resolveCommitteeConfig } from "../config/config.js";
import { appendRunRecord, buildRunRecord } from "../ops/runs.js";
import { formatScanLine, loadScanInput, scanInstruments } from "../scan/scan.js";
import { appendCommitteeDecisions, toStoredDecision } from "../scan/store.js";

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("must be a positive number");
  }
  return parsed;
}

async function main() {
  const program = new Command();
  program
    .name("committee_scan")
    .requiredOption("--input <path>", "Path to a JSON scan input (market + instruments)")
    .option("--config <path>", "Path to a committee config JSON file")
    .option("--capital <amount>", "Capital available per trade", parsePositiveNumber)
    .option("--leverage <factor>", "Leverage applied to capital", parsePositiveNumber)
    .option("--persist", "Append decisions and a run record to the state directory")
    .option("--json", "Print the full ranked decisions as JSON");

  program.parse(process.argv);
  const opts = program.opts<{
    input: string;
    config?: string;
    capital?: number;
    leverage?: number;
    persist?: boolean;
    json?: boolean;
  }>();

  const overrides: CommitteeConfig = {};
  if (opts.capital !== undefined) {
    overrides.capital = opts.capital;
  }
  if (opts.leverage !== undefined) {
    overrides.leverage = opts.leverage;
  }
  const config = resolveCommitteeConfig(loadConfig(opts.config), overrides);

  const runId = `committee-${crypto.randomUUID()}`;
  const startedAt = new Date().toISOString();
  const input = await loadScanInput(opts.input);
  const result = scanInstruments({ market: input.market, instruments: input.instruments, config });
  const finishedAt = new Date().toISOString();

  if (opts.json) {
    console.log(JSON.stringify(result.ranked.map((entry) => entry.decision), null, 2));
  } else {
    for (const entry of result.ranked) {
      console.log(formatScanLine(entry));
    }
  }
  const { counts } = result;
  console.log(
    `scanned=${counts.scanned} buys=${counts.buys} watchlist=${counts.watchlist} rejected=${counts.rejected} skipped=${counts.skipped} excluded=${counts.excluded}`,
  );

  if (opts.persist) {
    await appendCommitteeDecisions(
      result.ranked.map((entry) =>
        toStoredDecision({ decision: entry.decision, runId, evaluatedAt: finishedAt }),
      ),
    );
    await appendRunRecord(
      buildRunRecord({ runId, job: "committee_scan", startedAt, finishedAt, counts: { ...counts } }),
    );
    console.log(`runId=${runId} persisted=${result.ranked.length}`);
  }
}

main().catch((err) => {
  console.error(String(err));
  process.exitCode = 1;
});
