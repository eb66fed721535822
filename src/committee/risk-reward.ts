import type { RiskRewardResult, RiskRewardSignals, TickerSnapshot } from "./types.js";
import { resolveTickerFields } from "./defaults.js";
import { borderline, fail, pass, round } from "./utils.js";

export const RISK_REWARD_MAX_SCORE = 15;
export const DEFAULT_MIN_RISK_REWARD = 3.0;
export const DEFAULT_RISK_PER_TRADE_PCT = 2;

const MAX_STOP_PCT_WITHOUT_ATR = 7;
const SIZING_OVERFLOW_RATIO = 1.2;

export type RiskRewardParams = {
  ticker: TickerSnapshot;
  entry: number;
  stop: number;
  target: number;
  capital?: number;
  leverage?: number;
  /** Share of capital put at risk per trade, in percent. */
  riskPerTradePct?: number;
  /** Reward:risk ratio below which the trade is vetoed. */
  minRiskReward?: number;
};

function rejected(reason: string, riskAmount: number): RiskRewardResult {
  const signals: RiskRewardSignals = {
    rrRatio: 0,
    stopAtrMultiple: 0,
    suggestedPosition: 0,
    riskAmount,
    stopPct: 0,
  };
  return {
    style: "risk_reward",
    score: 0,
    maxScore: RISK_REWARD_MAX_SCORE,
    reasoning: [fail(reason)],
    signals,
    hardReject: true,
  };
}

function scoreRatio(rr: number): { points: number; line: string } {
  const label = `${rr.toFixed(1)}:1`;
  if (rr >= 4) {
    return { points: 8, line: pass(`Excellent R:R ${label}`) };
  }
  if (rr >= 3) {
    return { points: 6, line: pass(`Acceptable R:R ${label} (required minimum)`) };
  }
  if (rr >= 2) {
    return { points: 3, line: borderline(`Marginal R:R ${label} (below recommended minimum)`) };
  }
  return { points: 0, line: fail(`Insufficient R:R ${label}, do not trade`) };
}

function scoreStop(params: { risk: number; entry: number; atr: number; price: number }): {
  points: number;
  line: string;
} {
  if (params.atr > 0 && params.price > 0) {
    const multiple = params.risk / params.atr;
    const label = `Stop = ${multiple.toFixed(1)}x ATR`;
    if (multiple >= 1.5 && multiple <= 2.5) {
      return { points: 4, line: pass(`${label} (well structured)`) };
    }
    if (multiple >= 1 && multiple <= 3) {
      return { points: 2, line: borderline(`${label} (acceptable)`) };
    }
    return multiple < 1
      ? { points: 0, line: fail(`${label} (too tight, noise can stop you out)`) }
      : { points: 0, line: fail(`${label} (too wide, excessive risk)`) };
  }
  const stopPct = (params.risk / params.entry) * 100;
  if (stopPct <= MAX_STOP_PCT_WITHOUT_ATR) {
    return { points: 2, line: borderline(`Stop ${stopPct.toFixed(1)}% without ATR (assumed reasonable)`) };
  }
  return { points: 0, line: fail(`Stop ${stopPct.toFixed(1)}% without ATR to validate it`) };
}

export function evaluateRiskReward(params: RiskRewardParams): RiskRewardResult {
  const { entry, stop, target } = params;
  const capital = params.capital ?? 500;
  const leverage = params.leverage ?? 5;
  const riskPerTradePct = params.riskPerTradePct ?? DEFAULT_RISK_PER_TRADE_PCT;
  const minRiskReward = params.minRiskReward ?? DEFAULT_MIN_RISK_REWARD;
  const { atr14, price } = resolveTickerFields(params.ticker);
  const maxRisk = capital * (riskPerTradePct / 100);

  if (!(entry > 0) || !(stop > 0) || !(target > 0)) {
    return rejected("Invalid prices for R:R calculation", 0);
  }

  const risk = entry - stop;
  const reward = target - entry;
  if (risk <= 0) {
    return rejected("Invalid stop loss (must sit below entry)", maxRisk);
  }

  const rrRatio = reward / risk;
  const reasoning: string[] = [];
  let score = 0;

  for (const part of [scoreRatio(rrRatio), scoreStop({ risk, entry, atr: atr14, price })]) {
    score += part.points;
    reasoning.push(part.line);
  }

  const exposureCapacity = capital * leverage;
  const positionValue = (maxRisk / risk) * entry;
  if (!(maxRisk > 0) || !(exposureCapacity > 0)) {
    reasoning.push(fail("No capital available for sizing"));
  } else if (positionValue <= exposureCapacity) {
    score += 3;
    reasoning.push(
      pass(`Viable sizing: ${positionValue.toFixed(0)} exposure for ${maxRisk.toFixed(0)} at risk`),
    );
  } else if (positionValue <= exposureCapacity * SIZING_OVERFLOW_RATIO) {
    score += 1;
    reasoning.push(
      borderline(`Tight sizing: ${positionValue.toFixed(0)} (limit ${exposureCapacity.toFixed(0)})`),
    );
  } else {
    reasoning.push(
      fail(
        `Sizing exceeds capacity: would need ${positionValue.toFixed(0)} (limit ${exposureCapacity.toFixed(0)})`,
      ),
    );
  }

  return {
    style: "risk_reward",
    score,
    maxScore: RISK_REWARD_MAX_SCORE,
    reasoning,
    signals: {
      rrRatio: round(rrRatio, 2),
      stopAtrMultiple: atr14 > 0 ? round(risk / atr14, 2) : 0,
      suggestedPosition: positionValue > 0 ? Math.min(positionValue, exposureCapacity) : 0,
      riskAmount: maxRisk,
      stopPct: round((risk / entry) * 100, 2),
    },
    // The veto stands on its own: a high component score does not lift it.
    hardReject: rrRatio < minRiskReward,
  };
}
