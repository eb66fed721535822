import { describe, expect, it } from "vitest";
import { CATALYST_TAXONOMY, evaluateCatalyst, scoreCatalystType } from "./catalyst.js";

const ticker = { price: 40 };

describe("evaluateCatalyst", () => {
  it("returns the neutral score without a catalyst", () => {
    const result = evaluateCatalyst(ticker, null);
    expect(result.score).toBe(12);
    expect(result.signals).toEqual({
      catalystType: "none",
      daysToEvent: 999,
      historicalAvgMovePct: 0,
      expectations: null,
    });
    expect(result.reasoning).toEqual(["~ No catalyst identified, scoring on technical setup"]);
  });

  it("scores an earnings event in the sweet spot with low expectations", () => {
    const result = evaluateCatalyst(
      { ...ticker, historicalEventReactionPct: 12 },
      { type: "Earnings", daysToEvent: 5, expectations: "LOW" },
    );
    expect(result.score).toBe(6 + 7 + 5 + 5);
    expect(result.reasoning).toEqual([
      "✓ Catalyst: earnings (6/8 pts)",
      "✓ Ideal timing: 5 days to event",
      "✓ History: moves ~12% on similar events",
      "✓ Low expectations, room for a positive surprise",
    ]);
    expect(result.signals.catalystType).toBe("earnings");
    expect(result.signals.expectations).toBe("low");
  });

  it("scores a regulatory decision with high expectations", () => {
    const result = evaluateCatalyst(ticker, {
      type: "FDA_Decision",
      daysToEvent: 10,
      expectations: "high",
    });
    // 8 type + 4 timing + 2 no history + 1 high expectations
    expect(result.score).toBe(15);
  });

  it("only rewards low expectations for asymmetric event types", () => {
    const result = evaluateCatalyst(ticker, {
      type: "earnings_beat_history",
      daysToEvent: 5,
      expectations: "low",
    });
    // 8 type + 7 timing + 2 no history + 3 unknown expectations
    expect(result.score).toBe(20);
  });

  it("defaults the expectations and the event date", () => {
    const result = evaluateCatalyst(ticker, { type: "buyback" });
    // 5 type + 1 far event + 2 no history + 3 neutral expectations
    expect(result.score).toBe(11);
    expect(result.signals.daysToEvent).toBe(999);
  });

  it("maps days to event into timing bands", () => {
    const timing = (daysToEvent: number) =>
      evaluateCatalyst(ticker, { type: "unknown", daysToEvent, expectations: "neutral" }).score -
      (2 + 2 + 3);
    expect(timing(3)).toBe(7);
    expect(timing(7)).toBe(7);
    expect(timing(1)).toBe(4);
    expect(timing(14)).toBe(4);
    expect(timing(15)).toBe(2);
    expect(timing(29)).toBe(2);
    expect(timing(30)).toBe(1);
    expect(timing(0)).toBe(2);
    expect(timing(-2)).toBe(2);
  });

  it("maps the historical reaction into bands", () => {
    const history = (historicalEventReactionPct: number) =>
      evaluateCatalyst(
        { price: 10, historicalEventReactionPct },
        { type: "rumor", daysToEvent: 40, expectations: "neutral" },
      ).score -
      (2 + 1 + 3);
    expect(history(10)).toBe(5);
    expect(history(6)).toBe(3);
    expect(history(3)).toBe(1);
    expect(history(0)).toBe(2);
  });

  it("treats an empty descriptor as no catalyst", () => {
    for (const descriptor of [{}, { type: "  ", daysToEvent: null, expectations: "" }]) {
      const result = evaluateCatalyst(ticker, descriptor);
      expect(result.score).toBe(12);
      expect(result.signals.catalystType).toBe("none");
      expect(result.reasoning).toEqual(["~ No catalyst identified, scoring on technical setup"]);
    }
  });

  it("scores a descriptor that only carries timing", () => {
    const result = evaluateCatalyst(ticker, { daysToEvent: 5 });
    // 2 unknown type + 7 timing + 2 no history + 3 unknown expectations
    expect(result.score).toBe(14);
    expect(result.signals.catalystType).toBe("unknown");
  });

  it("stays within its maximum", () => {
    const result = evaluateCatalyst(
      { price: 10, historicalEventReactionPct: 25 },
      { type: "fda", daysToEvent: 4, expectations: "low" },
    );
    expect(result.score).toBe(25);
    expect(result.score).toBeLessThanOrEqual(result.maxScore);
  });
});

describe("scoreCatalystType", () => {
  it("matches the first pattern in declaration order", () => {
    expect(scoreCatalystType("earnings_beat_history")).toBe(8);
    expect(scoreCatalystType("m&a_rumor")).toBe(7);
    expect(scoreCatalystType("pending merger vote")).toBe(7);
    expect(scoreCatalystType("analyst_upgrade")).toBe(5);
    expect(scoreCatalystType("macro_event")).toBe(4);
    expect(scoreCatalystType("speculation")).toBe(2);
  });

  it("falls back to the unknown score", () => {
    expect(scoreCatalystType("secondary offering")).toBe(2);
  });

  it("never exceeds the type maximum", () => {
    expect(Math.max(...CATALYST_TAXONOMY.map((entry) => entry.score))).toBe(8);
  });
});
