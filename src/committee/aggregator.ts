import type { ResolvedCommitteeConfig } from "../config/types.committee.js";
import type {
  CatalystDescriptor,
  CommitteeAction,
  CommitteeDecision,
  MarketSnapshot,
  RiskRewardResult,
  TickerSnapshot,
} from "./types.js";
import { DEFAULT_COMMITTEE_CONFIG } from "../config/config.js";
import { evaluateCatalyst } from "./catalyst.js";
import { type ResolvedTicker, resolveTickerFields } from "./defaults.js";
import { REGIME_MAX_SCORE, applySectorAdjustment, detectRegime } from "./regime.js";
import { evaluateRiskReward } from "./risk-reward.js";
import { evaluateSeykota } from "./seykota.js";
import { evaluateTurtles } from "./turtles.js";
import { clamp, normalizeInstrumentId, round } from "./utils.js";

export type OpportunityParams = {
  instrumentId: string;
  ticker: TickerSnapshot;
  market: MarketSnapshot;
  catalyst?: CatalystDescriptor | null;
  entry?: number | null;
  stop?: number | null;
  target?: number | null;
  /** Overrides `config.capital` when positive. */
  capital?: number;
  /** Overrides `config.leverage` when positive. */
  leverage?: number;
  config?: ResolvedCommitteeConfig;
};

export type TradePlan = {
  entry: number;
  stop: number;
  target: number;
};

export type DecisionSelection = {
  decision: CommitteeAction;
  decisionReason: string;
};

// Beta ladder for the percentage stop used when ATR is unavailable.
const BETA_STOP_LADDER: Array<{ minBeta: number; stopPct: number }> = [
  { minBeta: 2.0, stopPct: 10 },
  { minBeta: 1.5, stopPct: 8 },
];
const BASE_STOP_PCT = 6;

function presentPrice(value: number | null | undefined): value is number {
  return value !== null && value !== undefined && Number.isFinite(value);
}

function positiveOverride(value: number | undefined): number | null {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Fills in whichever of entry/stop/target the caller left out: a resting limit slightly under
 * the price, a 2x ATR stop (or a beta-keyed percentage stop), and a 15% target raised to 20%
 * on strong days.
 */
export function deriveTradePlan(params: {
  ticker: ResolvedTicker;
  entry?: number | null;
  stop?: number | null;
  target?: number | null;
  tradePlan: ResolvedCommitteeConfig["tradePlan"];
}): TradePlan {
  const { price, atr14, beta, changePct } = params.ticker;
  const plan = params.tradePlan;

  const entry = presentPrice(params.entry)
    ? params.entry
    : price * (1 - plan.entryDiscountPct / 100);

  let stop: number;
  if (presentPrice(params.stop)) {
    stop = params.stop;
  } else if (atr14 > 0) {
    stop = price - atr14 * plan.atrStopMultiple;
  } else {
    const stopPct = BETA_STOP_LADDER.find((step) => beta >= step.minBeta)?.stopPct ?? BASE_STOP_PCT;
    stop = price * (1 - stopPct / 100);
  }

  let target: number;
  if (presentPrice(params.target)) {
    target = params.target;
  } else {
    const targetPct =
      changePct > plan.momentumChangePct ? plan.targetPctAggressive : plan.targetPctConservative;
    target = price * (1 + targetPct / 100);
  }

  return { entry, stop, target };
}

export function selectDecision(params: {
  finalScore: number;
  riskReward: Pick<RiskRewardResult, "hardReject" | "signals">;
  thresholds: ResolvedCommitteeConfig["thresholds"];
  minRiskReward: number;
}): DecisionSelection {
  const { finalScore, thresholds } = params;
  if (params.riskReward.hardReject) {
    return {
      decision: "REJECT",
      decisionReason: `R:R ${params.riskReward.signals.rrRatio.toFixed(2)}:1 below required ${params.minRiskReward}:1 minimum`,
    };
  }
  if (finalScore >= thresholds.buy) {
    return { decision: "BUY", decisionReason: `Score ${finalScore}/100, high-conviction opportunity` };
  }
  if (finalScore >= thresholds.watchlist) {
    return {
      decision: "WATCHLIST",
      decisionReason: `Score ${finalScore}/100, monitor for a better entry`,
    };
  }
  return { decision: "SKIP", decisionReason: `Score ${finalScore}/100, insufficient conviction` };
}

export function buildUnscorableDecision(instrumentId: string, reason: string): CommitteeDecision {
  return {
    instrumentId,
    decision: "SKIP",
    decisionReason: reason,
    finalScore: 0,
    regime: {
      regime: "unknown",
      score: 0,
      maxScore: REGIME_MAX_SCORE,
      reasoning: reason,
      sectorBias: { boost: [], penalize: [] },
    },
    breakdown: {
      regime: 0,
      turtles: 0,
      seykota: 0,
      catalyst: 0,
      riskReward: 0,
      sectorAdjustment: 0,
      rawScore: 0,
    },
    reasoning: { regime: [reason], turtles: [], seykota: [], catalyst: [], riskReward: [] },
    tradeParams: {
      entry: 0,
      stop: 0,
      target: 0,
      rrRatio: 0,
      position: 0,
      stopPct: 0,
      targetPct: 0,
    },
    signals: null,
  };
}

export function evaluateOpportunity(params: OpportunityParams): CommitteeDecision {
  const instrumentId = normalizeInstrumentId(params.instrumentId);
  const config = params.config ?? DEFAULT_COMMITTEE_CONFIG;
  const ticker = resolveTickerFields(params.ticker);

  if (!(ticker.price > 0)) {
    return buildUnscorableDecision(instrumentId, "No price data");
  }

  const { entry, stop, target } = deriveTradePlan({
    ticker,
    entry: params.entry,
    stop: params.stop,
    target: params.target,
    tradePlan: config.tradePlan,
  });

  const regime = detectRegime(params.market);
  const turtles = evaluateTurtles(params.ticker);
  const seykota = evaluateSeykota(params.ticker);
  const catalyst = evaluateCatalyst(params.ticker, params.catalyst);
  const riskReward = evaluateRiskReward({
    ticker: params.ticker,
    entry,
    stop,
    target,
    capital: positiveOverride(params.capital) ?? config.capital,
    leverage: positiveOverride(params.leverage) ?? config.leverage,
    riskPerTradePct: config.riskPerTradePct,
    minRiskReward: config.minRiskReward,
  });

  const rawScore = regime.score + turtles.score + seykota.score + catalyst.score + riskReward.score;
  const finalScore = clamp(applySectorAdjustment(rawScore, ticker.sector, regime), 0, 100);
  const { decision, decisionReason } = selectDecision({
    finalScore,
    riskReward,
    thresholds: config.thresholds,
    minRiskReward: config.minRiskReward,
  });

  return {
    instrumentId,
    decision,
    decisionReason,
    finalScore,
    regime,
    breakdown: {
      regime: regime.score,
      turtles: turtles.score,
      seykota: seykota.score,
      catalyst: catalyst.score,
      riskReward: riskReward.score,
      sectorAdjustment: finalScore - rawScore,
      rawScore,
    },
    reasoning: {
      regime: [regime.reasoning],
      turtles: turtles.reasoning,
      seykota: seykota.reasoning,
      catalyst: catalyst.reasoning,
      riskReward: riskReward.reasoning,
    },
    tradeParams: {
      entry: round(entry, 2),
      stop: round(stop, 2),
      target: round(target, 2),
      rrRatio: riskReward.signals.rrRatio,
      position: round(riskReward.signals.suggestedPosition, 2),
      stopPct: riskReward.signals.stopPct,
      targetPct: entry > 0 ? round(((target - entry) / entry) * 100, 2) : 0,
    },
    signals: {
      regime: regime.regime,
      turtles: turtles.signals,
      seykota: seykota.signals,
      catalyst: catalyst.signals,
      riskReward: riskReward.signals,
    },
  };
}
