import fs from "node:fs";
import type { CommitteeDecision, MarketSnapshot } from "../committee/types.js";
import type { ResolvedCommitteeConfig } from "../config/types.committee.js";
import type { ScanInput, ScanInstrument } from "./schema.js";
import { buildUnscorableDecision, evaluateOpportunity } from "../committee/aggregator.js";
import { normalizeInstrumentId } from "../committee/utils.js";
import { formatZodIssues } from "../config/config.js";
import { checkExclusions } from "../screening/exclusions.js";
import { ScanInputSchema } from "./schema.js";

export type ScanEntry = {
  decision: CommitteeDecision;
  exclusionReason: string | null;
};

export type ScanCounts = {
  scanned: number;
  buys: number;
  watchlist: number;
  rejected: number;
  skipped: number;
  excluded: number;
};

export type ScanResult = {
  /** Every entry, best score first. */
  ranked: ScanEntry[];
  buys: ScanEntry[];
  watchlist: ScanEntry[];
  counts: ScanCounts;
};

export function compareEntries(a: ScanEntry, b: ScanEntry): number {
  const byScore = b.decision.finalScore - a.decision.finalScore;
  if (byScore !== 0) {
    return byScore;
  }
  return a.decision.instrumentId.localeCompare(b.decision.instrumentId);
}

export function scanInstrument(params: {
  market: MarketSnapshot;
  instrument: ScanInstrument;
  config: ResolvedCommitteeConfig;
}): ScanEntry {
  const { instrument, config } = params;
  if (config.screening.enabled) {
    const exclusionReason = checkExclusions(instrument.ticker, config.screening);
    if (exclusionReason) {
      return {
        decision: buildUnscorableDecision(normalizeInstrumentId(instrument.id), exclusionReason),
        exclusionReason,
      };
    }
  }
  const decision = evaluateOpportunity({
    instrumentId: instrument.id,
    ticker: instrument.ticker,
    market: params.market,
    catalyst: instrument.catalyst,
    entry: instrument.entry,
    stop: instrument.stop,
    target: instrument.target,
    config,
  });
  return { decision, exclusionReason: null };
}

export function scanInstruments(params: {
  market: MarketSnapshot;
  instruments: ScanInstrument[];
  config: ResolvedCommitteeConfig;
}): ScanResult {
  const entries = params.instruments.map((instrument) =>
    scanInstrument({ market: params.market, instrument, config: params.config }),
  );
  const ranked = [...entries].sort(compareEntries);
  const allBuys = ranked.filter((entry) => entry.decision.decision === "BUY");
  const allWatchlist = ranked.filter((entry) => entry.decision.decision === "WATCHLIST");
  const excluded = ranked.filter((entry) => entry.exclusionReason !== null).length;
  return {
    ranked,
    buys: allBuys.slice(0, params.config.scan.maxBuys),
    watchlist: allWatchlist.slice(0, params.config.scan.maxWatchlist),
    counts: {
      scanned: entries.length,
      buys: allBuys.length,
      watchlist: allWatchlist.length,
      rejected: ranked.filter((entry) => entry.decision.decision === "REJECT").length,
      skipped: ranked.filter(
        (entry) => entry.decision.decision === "SKIP" && entry.exclusionReason === null,
      ).length,
      excluded,
    },
  };
}

export function formatScanLine(entry: ScanEntry): string {
  const { decision } = entry;
  const parts = [
    decision.instrumentId,
    `decision=${decision.decision}`,
    `score=${decision.finalScore}`,
    `rr=${decision.tradeParams.rrRatio}`,
  ];
  if (entry.exclusionReason) {
    parts.push(`excluded="${entry.exclusionReason}"`);
  }
  return parts.join(" ");
}

export function parseScanInput(raw: unknown): ScanInput {
  const parsed = ScanInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`invalid scan input: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadScanInput(filePath: string): Promise<ScanInput> {
  const text = await fs.promises.readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text) as unknown;
  } catch (err) {
    throw new Error(`failed to parse ${filePath}: ${String(err)}`, { cause: err });
  }
  return parseScanInput(raw);
}
