import type { TickerSnapshot } from "../committee/types.js";
import type { ResolvedCommitteeConfig } from "../config/types.committee.js";
import { finiteOrNull } from "../committee/utils.js";

export type ScreeningRules = ResolvedCommitteeConfig["screening"];

const SMALL_CAP_CEILING = 1e9;
const MID_CAP_CEILING = 10e9;

function formatMillions(value: number, digits = 0): string {
  return `${(value / 1e6).toFixed(digits)}M`;
}

function resolveVolumeTier(
  marketCap: number,
  tiers: ScreeningRules["minAvgVolume"],
): { label: string; floor: number } {
  if (marketCap < SMALL_CAP_CEILING) {
    return { label: "small cap", floor: tiers.small };
  }
  if (marketCap < MID_CAP_CEILING) {
    return { label: "mid cap", floor: tiers.mid };
  }
  return { label: "large cap", floor: tiers.large };
}

/** Returns why an instrument falls outside the tradable universe, or null when it passes. */
export function checkExclusions(ticker: TickerSnapshot, rules: ScreeningRules): string | null {
  const price = finiteOrNull(ticker.price) ?? 0;
  const marketCap = finiteOrNull(ticker.marketCap) ?? 0;
  const avgVolume = finiteOrNull(ticker.avgVolume20d) ?? 0;
  const beta = finiteOrNull(ticker.beta);

  if (price > 0 && price < rules.minPrice) {
    return `Penny stock ($${price} < $${rules.minPrice})`;
  }
  if (price > 0 && price > rules.maxPrice) {
    return `Price too high ($${price} > $${rules.maxPrice})`;
  }
  if (marketCap > 0) {
    if (marketCap < rules.minMarketCap) {
      return `Market cap too small ($${formatMillions(marketCap)} < $${formatMillions(rules.minMarketCap)})`;
    }
    if (marketCap > rules.maxMarketCap) {
      return `Mega cap ($${(marketCap / 1e9).toFixed(0)}B > $${(rules.maxMarketCap / 1e9).toFixed(0)}B)`;
    }
  }
  if (beta !== null && beta !== 0 && beta < rules.minBeta) {
    return `Beta too low (${beta.toFixed(2)} < ${rules.minBeta})`;
  }
  if (marketCap > 0 && avgVolume > 0) {
    const tier = resolveVolumeTier(marketCap, rules.minAvgVolume);
    if (avgVolume < tier.floor) {
      return `Insufficient volume for ${tier.label} (${formatMillions(avgVolume, 1)} < ${formatMillions(tier.floor, 1)})`;
    }
  }
  return null;
}
