export type CommitteeThresholdsConfig = {
  buy?: number;
  watchlist?: number;
};

export type TradePlanConfig = {
  entryDiscountPct?: number;
  atrStopMultiple?: number;
  targetPctConservative?: number;
  targetPctAggressive?: number;
  momentumChangePct?: number;
};

export type VolumeTierConfig = {
  small?: number;
  mid?: number;
  large?: number;
};

export type ScreeningConfig = {
  enabled?: boolean;
  minPrice?: number;
  maxPrice?: number;
  minMarketCap?: number;
  maxMarketCap?: number;
  minBeta?: number;
  minAvgVolume?: VolumeTierConfig;
};

export type ScanConfig = {
  maxBuys?: number;
  maxWatchlist?: number;
};

export type CommitteeConfig = {
  capital?: number;
  leverage?: number;
  riskPerTradePct?: number;
  minRiskReward?: number;
  thresholds?: CommitteeThresholdsConfig;
  tradePlan?: TradePlanConfig;
  screening?: ScreeningConfig;
  scan?: ScanConfig;
};

export type ResolvedCommitteeConfig = Readonly<{
  capital: number;
  leverage: number;
  riskPerTradePct: number;
  minRiskReward: number;
  thresholds: Readonly<Required<CommitteeThresholdsConfig>>;
  tradePlan: Readonly<Required<TradePlanConfig>>;
  screening: Readonly<
    Required<Omit<ScreeningConfig, "minAvgVolume">> & {
      minAvgVolume: Readonly<Required<VolumeTierConfig>>;
    }
  >;
  scan: Readonly<Required<ScanConfig>>;
}>;
