import type { CatalystDescriptor, CatalystResult, TickerSnapshot } from "./types.js";
import { resolveTickerFields } from "./defaults.js";
import { borderline, fail, finiteOrNull, pass } from "./utils.js";

export const CATALYST_MAX_SCORE = 25;
export const NO_CATALYST_SCORE = 12;
export const UNKNOWN_DAYS_TO_EVENT = 999;
export const UNKNOWN_CATALYST_SCORE = 2;

export type CatalystTaxonomyEntry = {
  pattern: string;
  score: number;
};

/**
 * Matched in declaration order; the first pattern contained in the lower-cased catalyst type
 * wins. Specific patterns sit before the generic ones they contain ("earnings_beat_history"
 * before "earnings", "m&a_rumor" before "rumor").
 */
export const CATALYST_TAXONOMY: readonly CatalystTaxonomyEntry[] = [
  { pattern: "fda_decision", score: 8 },
  { pattern: "fda_approval", score: 8 },
  { pattern: "fda", score: 8 },
  { pattern: "earnings_beat_history", score: 8 },
  { pattern: "m&a_rumor", score: 7 },
  { pattern: "m&a", score: 7 },
  { pattern: "merger", score: 7 },
  { pattern: "acquisition", score: 7 },
  { pattern: "earnings", score: 6 },
  { pattern: "product_launch", score: 6 },
  { pattern: "investor_day", score: 5 },
  { pattern: "conference", score: 4 },
  { pattern: "macro_event", score: 4 },
  { pattern: "analyst_upgrade", score: 5 },
  { pattern: "buyback", score: 5 },
  { pattern: "rumor", score: 2 },
  { pattern: "speculation", score: 2 },
  { pattern: "unknown", score: UNKNOWN_CATALYST_SCORE },
];

// Event types where low expectations leave room for an outsized surprise.
const ASYMMETRIC_TYPES = new Set(["earnings", "fda_decision", "fda", "product_launch"]);

export function scoreCatalystType(catalystType: string): number {
  const normalized = catalystType.toLowerCase();
  const match = CATALYST_TAXONOMY.find((entry) => normalized.includes(entry.pattern));
  return match?.score ?? UNKNOWN_CATALYST_SCORE;
}

function scoreTiming(days: number): { points: number; line: string } {
  if (days >= 3 && days <= 7) {
    return { points: 7, line: pass(`Ideal timing: ${days} days to event`) };
  }
  if (days >= 1 && days <= 14) {
    return { points: 4, line: borderline(`Acceptable timing: ${days} days to event`) };
  }
  if (days > 14 && days < 30) {
    return { points: 2, line: borderline(`Event somewhat distant: ${days} days (capital tied up)`) };
  }
  if (days >= 30) {
    return { points: 1, line: fail(`Event too distant: ${days} days`) };
  }
  return { points: 2, line: borderline(`Event imminent or past (${days} days)`) };
}

function scoreHistoricalReaction(movePct: number): { points: number; line: string } {
  if (movePct >= 10) {
    return { points: 5, line: pass(`History: moves ~${movePct.toFixed(0)}% on similar events`) };
  }
  if (movePct >= 5) {
    return {
      points: 3,
      line: borderline(`History: moves ~${movePct.toFixed(0)}% on similar events`),
    };
  }
  if (movePct > 0) {
    return { points: 1, line: fail(`Low historical reactivity (${movePct.toFixed(0)}%)`) };
  }
  return { points: 2, line: borderline("No historical event reaction data") };
}

function scoreExpectations(
  expectations: string | null,
  catalystType: string,
): { points: number; line: string } {
  if (expectations === "low" && ASYMMETRIC_TYPES.has(catalystType)) {
    return { points: 5, line: pass("Low expectations, room for a positive surprise") };
  }
  if (expectations === "neutral") {
    return { points: 3, line: borderline("Neutral expectations") };
  }
  if (expectations === "high") {
    return { points: 1, line: fail("High expectations, limited upside and downside on a miss") };
  }
  return { points: 3, line: borderline("Expectations unknown (assuming neutral)") };
}

function isEmptyDescriptor(catalyst: CatalystDescriptor): boolean {
  return (
    !catalyst.type?.trim() &&
    (catalyst.daysToEvent === null || catalyst.daysToEvent === undefined) &&
    !catalyst.expectations?.trim()
  );
}

export function evaluateCatalyst(
  ticker: TickerSnapshot,
  catalyst: CatalystDescriptor | null | undefined,
): CatalystResult {
  const { historicalEventReactionPct } = resolveTickerFields(ticker);

  if (!catalyst || isEmptyDescriptor(catalyst)) {
    return {
      style: "catalyst",
      score: NO_CATALYST_SCORE,
      maxScore: CATALYST_MAX_SCORE,
      reasoning: [borderline("No catalyst identified, scoring on technical setup")],
      signals: {
        catalystType: "none",
        daysToEvent: UNKNOWN_DAYS_TO_EVENT,
        historicalAvgMovePct: 0,
        expectations: null,
      },
    };
  }

  const catalystType = (catalyst.type?.trim() || "unknown").toLowerCase();
  const daysToEvent = finiteOrNull(catalyst.daysToEvent) ?? UNKNOWN_DAYS_TO_EVENT;
  const expectations = catalyst.expectations?.trim().toLowerCase() || null;

  const reasoning: string[] = [];
  let score = 0;

  const typeScore = scoreCatalystType(catalystType);
  score += typeScore;
  const typeLine = `Catalyst: ${catalystType} (${typeScore}/8 pts)`;
  reasoning.push(typeScore >= 6 ? pass(typeLine) : borderline(typeLine));

  for (const part of [
    scoreTiming(daysToEvent),
    scoreHistoricalReaction(historicalEventReactionPct),
    scoreExpectations(expectations, catalystType),
  ]) {
    score += part.points;
    reasoning.push(part.line);
  }

  return {
    style: "catalyst",
    score,
    maxScore: CATALYST_MAX_SCORE,
    reasoning,
    signals: {
      catalystType,
      daysToEvent,
      historicalAvgMovePct: historicalEventReactionPct,
      expectations,
    },
  };
}
