import type { TickerSnapshot, TurtlesResult } from "./types.js";
import { resolveTickerFields } from "./defaults.js";
import { borderline, fail, pass } from "./utils.js";

export const TURTLES_MAX_SCORE = 25;

const NEAR_BREAKOUT_RATIO = 0.98;
const STRONG_VOLUME_RATIO = 1.5;
const WEAK_VOLUME_RATIO = 1.2;

/**
 * Breakout-with-volume setup scoring.
 *
 * - 20-day breakout: 10 (5 when within 2% below the high)
 * - volume confirmation: 8
 * - extension above the breakout level: 4 (2 when there is no breakout to extend from)
 * - ATR as a share of price: 3
 */
export function evaluateTurtles(ticker: TickerSnapshot): TurtlesResult {
  const { price, high20d, avgVolume20d, volume, atr14 } = resolveTickerFields(ticker);
  const reasoning: string[] = [];
  let score = 0;

  const pctFromHigh = high20d > 0 ? ((price - high20d) / high20d) * 100 : 0;
  const breakout = high20d > 0 && price > high20d;
  if (breakout) {
    score += 10;
    reasoning.push(
      pass(
        `Breakout: price $${price.toFixed(2)} > 20d high $${high20d.toFixed(2)} (+${pctFromHigh.toFixed(1)}%)`,
      ),
    );
  } else if (price >= high20d * NEAR_BREAKOUT_RATIO) {
    score += 5;
    const pctBelow = -pctFromHigh;
    reasoning.push(borderline(`Near breakout: only ${pctBelow.toFixed(1)}% below 20d high`));
  } else {
    const pctBelow = -pctFromHigh;
    reasoning.push(fail(`No breakout: ${pctBelow.toFixed(1)}% below 20d high`));
  }

  const volumeRatio = avgVolume20d > 0 ? volume / avgVolume20d : 1.0;
  if (volumeRatio > STRONG_VOLUME_RATIO) {
    score += 8;
    reasoning.push(pass(`Volume ${volumeRatio.toFixed(1)}x average (strong confirmation)`));
  } else if (volumeRatio > WEAK_VOLUME_RATIO) {
    score += 4;
    reasoning.push(borderline(`Volume ${volumeRatio.toFixed(1)}x average (weak confirmation)`));
  } else {
    reasoning.push(fail(`Insufficient volume (${volumeRatio.toFixed(1)}x)`));
  }

  if (breakout) {
    const extension = pctFromHigh;
    if (extension < 5) {
      score += 4;
      reasoning.push(pass(`Early entry: only ${extension.toFixed(1)}% above breakout`));
    } else if (extension < 10) {
      score += 2;
      reasoning.push(borderline(`Moderate extension: ${extension.toFixed(1)}% above breakout`));
    } else {
      reasoning.push(fail(`Overextended: ${extension.toFixed(1)}% above breakout (chase risk)`));
    }
  } else {
    score += 2;
    reasoning.push(borderline("Not extended (no active breakout)"));
  }

  const atrPct = price > 0 && atr14 > 0 ? (atr14 / price) * 100 : 0;
  if (atrPct > 0) {
    if (atrPct >= 2 && atrPct <= 6) {
      score += 3;
      reasoning.push(pass(`ATR ${atrPct.toFixed(1)}%, manageable stop`));
    } else if (atrPct >= 1 && atrPct < 2) {
      score += 1;
      reasoning.push(borderline(`ATR ${atrPct.toFixed(1)}%, little movement`));
    } else if (atrPct > 6 && atrPct <= 8) {
      score += 1;
      reasoning.push(borderline(`ATR ${atrPct.toFixed(1)}%, volatile but manageable`));
    } else if (atrPct > 8) {
      reasoning.push(fail(`ATR ${atrPct.toFixed(1)}%, too volatile`));
    } else {
      reasoning.push(fail(`ATR ${atrPct.toFixed(1)}%, too quiet`));
    }
  } else {
    reasoning.push(fail("No ATR data"));
  }

  return {
    style: "turtles",
    score,
    maxScore: TURTLES_MAX_SCORE,
    reasoning,
    signals: {
      breakout,
      volumeConfirmed: volumeRatio > STRONG_VOLUME_RATIO,
      atrPct,
      volumeRatio,
    },
  };
}
