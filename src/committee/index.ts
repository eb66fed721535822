export { detectRegime, applySectorAdjustment } from "./regime.js";
export { evaluateTurtles } from "./turtles.js";
export { evaluateSeykota } from "./seykota.js";
export { evaluateCatalyst } from "./catalyst.js";
export { evaluateRiskReward } from "./risk-reward.js";
export { evaluateOpportunity } from "./aggregator.js";
export type * from "./types.js";
