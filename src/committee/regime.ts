import type { MarketSnapshot, RegimeResult, SectorBias } from "./types.js";
import { resolveMarketFields } from "./defaults.js";

export const REGIME_MAX_SCORE = 15;

const LOW_VIX = 18;
const ELEVATED_VIX = 20;
const HIGH_VIX = 25;
const PANIC_VIX = 30;
const EXPANSIVE_BREADTH = 1.2;

const SCORE_RISK_ON = 15;
const SCORE_NEUTRAL = 10;
const SCORE_RISK_OFF = 5;
const SCORE_PANIC = 0;

const GROWTH_BIAS: SectorBias = {
  boost: ["tech", "consumer_discretionary", "semiconductors"],
  penalize: [],
};

const DEFENSIVE_BIAS: SectorBias = {
  boost: ["utilities", "healthcare", "staples"],
  penalize: ["tech", "growth", "small_caps"],
};

function emptyBias(): SectorBias {
  return { boost: [], penalize: [] };
}

function copyBias(bias: SectorBias): SectorBias {
  return { boost: [...bias.boost], penalize: [...bias.penalize] };
}

export function detectRegime(market: MarketSnapshot): RegimeResult {
  const { vix, spyAbove200Ema, advanceDeclineRatio } = resolveMarketFields(market);

  if (vix === null) {
    return {
      regime: "unknown",
      score: SCORE_NEUTRAL,
      maxScore: REGIME_MAX_SCORE,
      reasoning: "No VIX reading, assuming neutral conditions",
      sectorBias: emptyBias(),
    };
  }

  if (vix < LOW_VIX && spyAbove200Ema) {
    // Expansive breadth changes the explanation only; the score is already at the ceiling.
    const reasoning =
      advanceDeclineRatio >= EXPANSIVE_BREADTH
        ? `Low VIX (${vix.toFixed(1)}), SPY above 200 EMA, expansive breadth (${advanceDeclineRatio.toFixed(2)}). Favorable for breakouts.`
        : `Low VIX (${vix.toFixed(1)}), market in an uptrend. Good backdrop for longs.`;
    return {
      regime: "risk_on",
      score: SCORE_RISK_ON,
      maxScore: REGIME_MAX_SCORE,
      reasoning,
      sectorBias: copyBias(GROWTH_BIAS),
    };
  }

  if (vix > HIGH_VIX || (vix > ELEVATED_VIX && !spyAbove200Ema)) {
    const panic = vix >= PANIC_VIX;
    return {
      regime: "risk_off",
      score: panic ? SCORE_PANIC : SCORE_RISK_OFF,
      maxScore: REGIME_MAX_SCORE,
      reasoning: `${panic ? "Extreme" : "High"} VIX (${vix.toFixed(1)}), market in defensive mode. Trend following in defensive names only.`,
      sectorBias: copyBias(DEFENSIVE_BIAS),
    };
  }

  return {
    regime: "neutral",
    score: SCORE_NEUTRAL,
    maxScore: REGIME_MAX_SCORE,
    reasoning: `Moderate VIX (${vix.toFixed(1)}), mixed conditions. High-conviction setups only.`,
    sectorBias: emptyBias(),
  };
}

/**
 * Boosts (+5, capped at 100) or penalizes (-10, floored at 0) a score when the sector label
 * contains one of the regime's bias keys. Boost is checked first.
 */
export function applySectorAdjustment(
  rawScore: number,
  sector: string | null | undefined,
  regime: Pick<RegimeResult, "sectorBias">,
): number {
  if (!sector) {
    return rawScore;
  }
  const normalized = sector.toLowerCase();
  const matches = (key: string) => normalized.includes(key.toLowerCase());
  if (regime.sectorBias.boost.some(matches)) {
    return Math.min(rawScore + 5, 100);
  }
  if (regime.sectorBias.penalize.some(matches)) {
    return Math.max(rawScore - 10, 0);
  }
  return rawScore;
}
