import type { SeykotaResult, TickerSnapshot } from "./types.js";
import { resolveTickerFields } from "./defaults.js";
import { borderline, fail, pass } from "./utils.js";

export const SEYKOTA_MAX_SCORE = 20;

const EMA20_SUPPORT_RATIO = 0.97;

function scoreMomentum(momentum: number): { points: number; line: string } {
  const label = `${momentum > 0 ? "+" : ""}${momentum.toFixed(1)}% over 10d`;
  if (momentum > 5) {
    return { points: 4, line: pass(`Strong momentum ${label}`) };
  }
  if (momentum > 2) {
    return { points: 3, line: pass(`Positive momentum ${label}`) };
  }
  if (momentum > 0) {
    return { points: 2, line: borderline(`Mild momentum ${label}`) };
  }
  if (momentum > -3) {
    return { points: 1, line: borderline(`Nearly flat momentum ${label}`) };
  }
  return { points: 0, line: fail(`Negative momentum ${label}`) };
}

export function evaluateSeykota(ticker: TickerSnapshot): SeykotaResult {
  const { price, ema20, ema50, ema200, price10dAgo } = resolveTickerFields(ticker);
  const reasoning: string[] = [];
  let score = 0;

  if (price > 0 && ema20 > 0) {
    if (price > ema20) {
      score += 6;
      const pctAbove = ((price - ema20) / ema20) * 100;
      reasoning.push(pass(`Price > EMA20 (+${pctAbove.toFixed(1)}%, short-term uptrend)`));
    } else if (price >= ema20 * EMA20_SUPPORT_RATIO) {
      score += 3;
      reasoning.push(borderline("Price near EMA20 (key support)"));
    } else {
      const pctBelow = ((ema20 - price) / ema20) * 100;
      reasoning.push(fail(`Price < EMA20 (-${pctBelow.toFixed(1)}%, short-term weakness)`));
    }
  } else {
    reasoning.push(fail("No EMA20 data"));
  }

  if (ema20 > 0 && ema50 > 0) {
    if (ema20 > ema50) {
      score += 6;
      reasoning.push(pass("EMA20 > EMA50 (bullish structure)"));
    } else {
      reasoning.push(fail("EMA20 < EMA50 (bearish cross)"));
    }
  } else {
    reasoning.push(fail("No EMA data for structure"));
  }

  if (ema50 > 0 && ema200 > 0) {
    if (ema50 > ema200) {
      score += 4;
      reasoning.push(pass("EMA50 > EMA200 (primary uptrend)"));
    } else {
      reasoning.push(fail("EMA50 < EMA200 (primary downtrend, trading against it)"));
    }
  } else if (ema50 > 0) {
    score += 2;
    reasoning.push(borderline("No EMA200 (assuming neutral primary trend)"));
  } else {
    reasoning.push(fail("No long EMA data"));
  }

  const momentum10dPct = price10dAgo > 0 ? ((price - price10dAgo) / price10dAgo) * 100 : 0;
  if (price > 0 && price10dAgo > 0) {
    const momentum = scoreMomentum(momentum10dPct);
    score += momentum.points;
    reasoning.push(momentum.line);
  } else {
    reasoning.push(fail("No momentum data"));
  }

  const allPresent = price > 0 && ema20 > 0 && ema50 > 0 && ema200 > 0;
  return {
    style: "seykota",
    score,
    maxScore: SEYKOTA_MAX_SCORE,
    reasoning,
    signals: {
      trendAligned: allPresent && price > ema20 && ema20 > ema50 && ema50 > ema200,
      momentum10dPct,
      aboveEma20: ema20 > 0 && price > ema20,
      emasGolden: ema20 > 0 && ema50 > 0 && ema20 > ema50,
    },
  };
}
