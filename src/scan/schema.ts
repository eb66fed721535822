import { z } from "zod";

const OptionalNumber = z.number().finite().nullable().optional();

export const TickerSnapshotSchema = z
  .object({
    price: z.number().finite(),
    atr14: OptionalNumber,
    high20d: OptionalNumber,
    avgVolume20d: OptionalNumber,
    volume: OptionalNumber,
    ema20: OptionalNumber,
    ema50: OptionalNumber,
    ema200: OptionalNumber,
    price10dAgo: OptionalNumber,
    changePct: OptionalNumber,
    beta: OptionalNumber,
    sector: z.string().nullable().optional(),
    historicalEventReactionPct: OptionalNumber,
    marketCap: OptionalNumber,
  })
  .strict();

export const MarketSnapshotSchema = z
  .object({
    vix: OptionalNumber,
    sp500ChangePct: OptionalNumber,
    spyAbove200Ema: z.boolean().nullable().optional(),
    advanceDeclineRatio: OptionalNumber,
  })
  .strict();

export const CatalystDescriptorSchema = z
  .object({
    type: z.string().nullable().optional(),
    daysToEvent: OptionalNumber,
    expectations: z.string().nullable().optional(),
  })
  .strict();

export const ScanInstrumentSchema = z
  .object({
    id: z.string().min(1),
    ticker: TickerSnapshotSchema,
    catalyst: CatalystDescriptorSchema.nullable().optional(),
    entry: OptionalNumber,
    stop: OptionalNumber,
    target: OptionalNumber,
  })
  .strict();

export const ScanInputSchema = z
  .object({
    market: MarketSnapshotSchema,
    instruments: z.array(ScanInstrumentSchema),
  })
  .strict();

export type ScanInstrument = z.infer<typeof ScanInstrumentSchema>;
export type ScanInput = z.infer<typeof ScanInputSchema>;
