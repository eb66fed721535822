import { describe, expect, it } from "vitest";
import { evaluateSeykota } from "./seykota.js";

describe("evaluateSeykota", () => {
  it("awards the full score to a fully aligned trend", () => {
    const result = evaluateSeykota({
      price: 110,
      ema20: 105,
      ema50: 100,
      ema200: 90,
      price10dAgo: 100,
    });
    expect(result.score).toBe(20);
    expect(result.signals.trendAligned).toBe(true);
    expect(result.signals.aboveEma20).toBe(true);
    expect(result.signals.emasGolden).toBe(true);
    expect(result.signals.momentum10dPct).toBeCloseTo(10, 6);
    expect(result.reasoning).toHaveLength(4);
  });

  it("credits the EMA20 support zone and a neutral long trend without EMA200", () => {
    const result = evaluateSeykota({ price: 98, ema20: 100, ema50: 102, price10dAgo: 100 });
    // 3 support + 0 structure + 2 missing EMA200 + 1 nearly flat momentum
    expect(result.score).toBe(6);
    expect(result.reasoning).toEqual([
      "~ Price near EMA20 (key support)",
      "✗ EMA20 < EMA50 (bearish cross)",
      "~ No EMA200 (assuming neutral primary trend)",
      "~ Nearly flat momentum -2.0% over 10d",
    ]);
    expect(result.signals).toEqual({
      trendAligned: false,
      momentum10dPct: expect.closeTo(-2, 6),
      aboveEma20: false,
      emasGolden: false,
    });
  });

  it("gives nothing for the averages when none are available", () => {
    const result = evaluateSeykota({ price: 50 });
    // flat momentum from the price10dAgo default still earns one point
    expect(result.score).toBe(1);
    expect(result.reasoning.slice(0, 3)).toEqual([
      "✗ No EMA20 data",
      "✗ No EMA data for structure",
      "✗ No long EMA data",
    ]);
    expect(result.signals.trendAligned).toBe(false);
  });

  it("scores price well below EMA20 at zero for that component", () => {
    const result = evaluateSeykota({ price: 90, ema20: 100, price10dAgo: 90 });
    expect(result.reasoning[0]).toBe("✗ Price < EMA20 (-10.0%, short-term weakness)");
    expect(result.score).toBe(1);
  });

  it("penalizes a primary downtrend", () => {
    const result = evaluateSeykota({ price: 110, ema20: 105, ema50: 100, ema200: 120, price10dAgo: 110 });
    expect(result.score).toBe(6 + 6 + 0 + 1);
    expect(result.signals.trendAligned).toBe(false);
  });

  it("maps 10-day momentum into bands", () => {
    const withMomentum = (price10dAgo: number) =>
      evaluateSeykota({ price: 100, price10dAgo }).score;
    expect(withMomentum(90)).toBe(4);
    expect(withMomentum(97)).toBe(3);
    expect(withMomentum(99)).toBe(2);
    expect(withMomentum(101)).toBe(1);
    expect(withMomentum(110)).toBe(0);
  });

  it("reports missing momentum when the earlier price is zero", () => {
    const result = evaluateSeykota({ price: 100, price10dAgo: 0 });
    expect(result.score).toBe(0);
    expect(result.reasoning[3]).toBe("✗ No momentum data");
    expect(result.signals.momentum10dPct).toBe(0);
  });
});
