import fs from "node:fs";
import type { ZodError } from "zod";
import type { CommitteeConfig, ResolvedCommitteeConfig } from "./types.committee.js";
import { resolveConfigPath } from "./paths.js";
import { CommitteeConfigSchema } from "./zod-schema.committee.js";

export const DEFAULT_COMMITTEE_CONFIG: ResolvedCommitteeConfig = Object.freeze({
  capital: 500,
  leverage: 5,
  riskPerTradePct: 2,
  minRiskReward: 3,
  thresholds: Object.freeze({ buy: 75, watchlist: 60 }),
  tradePlan: Object.freeze({
    entryDiscountPct: 0.5,
    atrStopMultiple: 2,
    targetPctConservative: 15,
    targetPctAggressive: 20,
    momentumChangePct: 2,
  }),
  screening: Object.freeze({
    enabled: false,
    minPrice: 2,
    maxPrice: 500,
    minMarketCap: 100_000_000,
    maxMarketCap: 100_000_000_000,
    minBeta: 1.5,
    minAvgVolume: Object.freeze({ small: 1_000_000, mid: 750_000, large: 500_000 }),
  }),
  scan: Object.freeze({ maxBuys: 5, maxWatchlist: 10 }),
});

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseCommitteeConfig(raw: unknown): CommitteeConfig {
  const parsed = CommitteeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`invalid committee config: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadConfig(configPath: string = resolveConfigPath()): CommitteeConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  const text = fs.readFileSync(configPath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text) as unknown;
  } catch (err) {
    throw new Error(`failed to parse ${configPath}: ${String(err)}`, { cause: err });
  }
  return parseCommitteeConfig(raw);
}

/** Layers a partial config (and optional overrides) over the defaults into a frozen value. */
export function resolveCommitteeConfig(
  cfg: CommitteeConfig = {},
  overrides: CommitteeConfig = {},
): ResolvedCommitteeConfig {
  const base = DEFAULT_COMMITTEE_CONFIG;
  const screening = { ...cfg.screening, ...overrides.screening };
  const resolved: ResolvedCommitteeConfig = {
    capital: overrides.capital ?? cfg.capital ?? base.capital,
    leverage: overrides.leverage ?? cfg.leverage ?? base.leverage,
    riskPerTradePct: overrides.riskPerTradePct ?? cfg.riskPerTradePct ?? base.riskPerTradePct,
    minRiskReward: overrides.minRiskReward ?? cfg.minRiskReward ?? base.minRiskReward,
    thresholds: Object.freeze({
      buy: overrides.thresholds?.buy ?? cfg.thresholds?.buy ?? base.thresholds.buy,
      watchlist:
        overrides.thresholds?.watchlist ?? cfg.thresholds?.watchlist ?? base.thresholds.watchlist,
    }),
    tradePlan: Object.freeze({ ...base.tradePlan, ...cfg.tradePlan, ...overrides.tradePlan }),
    screening: Object.freeze({
      enabled: screening.enabled ?? base.screening.enabled,
      minPrice: screening.minPrice ?? base.screening.minPrice,
      maxPrice: screening.maxPrice ?? base.screening.maxPrice,
      minMarketCap: screening.minMarketCap ?? base.screening.minMarketCap,
      maxMarketCap: screening.maxMarketCap ?? base.screening.maxMarketCap,
      minBeta: screening.minBeta ?? base.screening.minBeta,
      minAvgVolume: Object.freeze({
        ...base.screening.minAvgVolume,
        ...cfg.screening?.minAvgVolume,
        ...overrides.screening?.minAvgVolume,
      }),
    }),
    scan: Object.freeze({ ...base.scan, ...cfg.scan, ...overrides.scan }),
  };
  if (resolved.thresholds.buy <= resolved.thresholds.watchlist) {
    throw new Error(
      `invalid committee config: thresholds: buy threshold (${resolved.thresholds.buy}) must be above the watchlist threshold (${resolved.thresholds.watchlist})`,
    );
  }
  return Object.freeze(resolved);
}
