import type { MarketSnapshot, TickerSnapshot } from "./types.js";
import { finiteOrNull } from "./utils.js";

/**
 * Ticker fields after default substitution. Every evaluator reads from this shape so the
 * fallback for a missing field is decided once, here:
 *
 * - `atr14`, `ema20`, `ema50`, `ema200`: 0, meaning "unavailable"
 * - `high20d`: the current price, so a missing high never reads as a breakout
 * - `avgVolume20d`: 1; `volume`: 0
 * - `price10dAgo`: the current price (flat momentum)
 * - `changePct`: 0; `beta`: 1.5; `historicalEventReactionPct`: 0
 * - `sector`: null
 */
export type ResolvedTicker = {
  price: number;
  atr14: number;
  high20d: number;
  avgVolume20d: number;
  volume: number;
  ema20: number;
  ema50: number;
  ema200: number;
  price10dAgo: number;
  changePct: number;
  beta: number;
  sector: string | null;
  historicalEventReactionPct: number;
};

export type ResolvedMarket = {
  vix: number | null;
  sp500ChangePct: number;
  spyAbove200Ema: boolean;
  advanceDeclineRatio: number;
};

export const DEFAULT_BETA = 1.5;
export const DEFAULT_AVG_VOLUME = 1;
export const DEFAULT_BREADTH = 1.0;

function positiveOr(value: number | null | undefined, fallback: number): number {
  const finite = finiteOrNull(value);
  return finite !== null && finite > 0 ? finite : fallback;
}

export function resolveTickerFields(ticker: TickerSnapshot): ResolvedTicker {
  const price = finiteOrNull(ticker.price) ?? 0;
  const sector = ticker.sector?.trim();
  return {
    price,
    atr14: positiveOr(ticker.atr14, 0),
    high20d: positiveOr(ticker.high20d, price),
    avgVolume20d: finiteOrNull(ticker.avgVolume20d) ?? DEFAULT_AVG_VOLUME,
    volume: finiteOrNull(ticker.volume) ?? 0,
    ema20: positiveOr(ticker.ema20, 0),
    ema50: positiveOr(ticker.ema50, 0),
    ema200: positiveOr(ticker.ema200, 0),
    price10dAgo: finiteOrNull(ticker.price10dAgo) ?? price,
    changePct: finiteOrNull(ticker.changePct) ?? 0,
    beta: finiteOrNull(ticker.beta) ?? DEFAULT_BETA,
    sector: sector ? sector : null,
    historicalEventReactionPct: finiteOrNull(ticker.historicalEventReactionPct) ?? 0,
  };
}

export function resolveMarketFields(market: MarketSnapshot): ResolvedMarket {
  return {
    vix: finiteOrNull(market.vix),
    sp500ChangePct: finiteOrNull(market.sp500ChangePct) ?? 0,
    // Missing trend data is read as an uptrend.
    spyAbove200Ema: market.spyAbove200Ema ?? true,
    advanceDeclineRatio: finiteOrNull(market.advanceDeclineRatio) ?? DEFAULT_BREADTH,
  };
}
