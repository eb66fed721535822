import { z } from "zod";

const PercentSchema = z.number().min(0).max(100);

const ThresholdsSchema = z
  .object({
    buy: z.number().int().min(0).max(100).optional(),
    watchlist: z.number().int().min(0).max(100).optional(),
  })
  .strict()
  .refine(
    (value) => value.buy === undefined || value.watchlist === undefined || value.buy > value.watchlist,
    { message: "buy threshold must be above the watchlist threshold" },
  );

const TradePlanSchema = z
  .object({
    entryDiscountPct: PercentSchema.optional(),
    atrStopMultiple: z.number().positive().optional(),
    targetPctConservative: z.number().positive().optional(),
    targetPctAggressive: z.number().positive().optional(),
    momentumChangePct: z.number().optional(),
  })
  .strict();

const VolumeTierSchema = z
  .object({
    small: z.number().nonnegative().optional(),
    mid: z.number().nonnegative().optional(),
    large: z.number().nonnegative().optional(),
  })
  .strict();

const ScreeningSchema = z
  .object({
    enabled: z.boolean().optional(),
    minPrice: z.number().nonnegative().optional(),
    maxPrice: z.number().positive().optional(),
    minMarketCap: z.number().nonnegative().optional(),
    maxMarketCap: z.number().positive().optional(),
    minBeta: z.number().optional(),
    minAvgVolume: VolumeTierSchema.optional(),
  })
  .strict();

const ScanSchema = z
  .object({
    maxBuys: z.number().int().positive().optional(),
    maxWatchlist: z.number().int().positive().optional(),
  })
  .strict();

export const CommitteeConfigSchema = z
  .object({
    capital: z.number().positive().optional(),
    leverage: z.number().positive().optional(),
    riskPerTradePct: PercentSchema.optional(),
    minRiskReward: z.number().positive().optional(),
    thresholds: ThresholdsSchema.optional(),
    tradePlan: TradePlanSchema.optional(),
    screening: ScreeningSchema.optional(),
    scan: ScanSchema.optional(),
  })
  .strict();
