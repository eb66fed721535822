export type TickerSnapshot = {
  price: number;
  atr14?: number | null;
  high20d?: number | null;
  avgVolume20d?: number | null;
  volume?: number | null;
  ema20?: number | null;
  ema50?: number | null;
  ema200?: number | null;
  price10dAgo?: number | null;
  changePct?: number | null;
  beta?: number | null;
  sector?: string | null;
  historicalEventReactionPct?: number | null;
  marketCap?: number | null;
};

export type MarketSnapshot = {
  vix?: number | null;
  sp500ChangePct?: number | null;
  spyAbove200Ema?: boolean | null;
  advanceDeclineRatio?: number | null;
};

export type CatalystDescriptor = {
  type?: string | null;
  daysToEvent?: number | null;
  expectations?: string | null;
};

export type MarketRegime = "risk_on" | "risk_off" | "neutral" | "unknown";

export type SectorBias = {
  boost: string[];
  penalize: string[];
};

export type RegimeResult = {
  regime: MarketRegime;
  score: number;
  maxScore: 15;
  reasoning: string;
  sectorBias: SectorBias;
};

export type EvaluatorResult<TStyle extends string, TSignals, TMax extends number> = {
  style: TStyle;
  score: number;
  maxScore: TMax;
  reasoning: string[];
  signals: TSignals;
};

export type TurtlesSignals = {
  breakout: boolean;
  volumeConfirmed: boolean;
  atrPct: number;
  volumeRatio: number;
};

export type SeykotaSignals = {
  trendAligned: boolean;
  momentum10dPct: number;
  aboveEma20: boolean;
  emasGolden: boolean;
};

export type CatalystSignals = {
  catalystType: string;
  daysToEvent: number;
  historicalAvgMovePct: number;
  expectations: string | null;
};

export type RiskRewardSignals = {
  rrRatio: number;
  stopAtrMultiple: number;
  suggestedPosition: number;
  riskAmount: number;
  stopPct: number;
};

export type TurtlesResult = EvaluatorResult<"turtles", TurtlesSignals, 25>;
export type SeykotaResult = EvaluatorResult<"seykota", SeykotaSignals, 20>;
export type CatalystResult = EvaluatorResult<"catalyst", CatalystSignals, 25>;
export type RiskRewardResult = EvaluatorResult<"risk_reward", RiskRewardSignals, 15> & {
  hardReject: boolean;
};

export type CommitteeAction = "BUY" | "WATCHLIST" | "SKIP" | "REJECT";

export type CommitteeComponent = "regime" | "turtles" | "seykota" | "catalyst" | "riskReward";

export type CommitteeBreakdown = Record<CommitteeComponent, number> & {
  sectorAdjustment: number;
  rawScore: number;
};

export type CommitteeReasoning = Record<CommitteeComponent, string[]>;

export type TradeParams = {
  entry: number;
  stop: number;
  target: number;
  rrRatio: number;
  position: number;
  stopPct: number;
  targetPct: number;
};

export type CommitteeSignals = {
  regime: MarketRegime;
  turtles: TurtlesSignals;
  seykota: SeykotaSignals;
  catalyst: CatalystSignals;
  riskReward: RiskRewardSignals;
};

export type CommitteeDecision = {
  instrumentId: string;
  decision: CommitteeAction;
  decisionReason: string;
  finalScore: number;
  regime: RegimeResult;
  breakdown: CommitteeBreakdown;
  reasoning: CommitteeReasoning;
  tradeParams: TradeParams;
  signals: CommitteeSignals | null;
};
