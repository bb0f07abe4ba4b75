/**
 * DataLoader wire contract
 * ========================
 *
 * Message shapes of `backend/proto/dataloader.proto` as they cross the
 * gRPC boundary (proto field names, numeric enums, uint64 as number).
 *
 * Requests are plain interfaces: protobufjs encodes them as given.
 * Responses arrive as untyped objects and are decoded with zod before use.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════

export const TickerType = {
  STOCK: 0,
  ETF: 1,
  COMMODITY: 2,
  CURRENCY: 3,
  CRYPTO: 4,
} as const;

export const Period = {
  YEAR: 0,
  SEMI_ANNUAL: 1,
  QUARTER: 2,
  MONTH: 3,
  WEEK: 4,
  DAY: 5,
  HOUR: 6,
  MINUTE: 7,
} as const;
export type PeriodCode = (typeof Period)[keyof typeof Period];

export const MovementType = {
  WINNER: 0,
  LOSER: 1,
  VOLUME: 2,
  VOLATILITY: 3,
  ABS_PERFORMANCE: 4,
} as const;

export const CorrelSign = {
  ABS: 0,
  POSITIVE: 1,
  NEGATIVE: 2,
} as const;

// ═══════════════════════════════════════════════════════════════
// REQUEST MESSAGES
// ═══════════════════════════════════════════════════════════════

export interface WireBasicTicker {
  ticker: string;
  security_type: number;
}

export interface WireTickerFilter {
  ticker_type: number;
  filter: string;
  limit: number;
  traded_within_past_n_days: number;
}

export interface WireTimeSeriesReq {
  ticker: WireBasicTicker;
  from_date: string;
  until_date: string;
  intraday: boolean;
}

export interface WireDateReq {
  ticker: string;
  security_type: number;
  intraday: boolean;
}

export interface WireMovementReq {
  ticker: string;
  security_type: number;
  until: string;
  period: number;
}

export interface WireMovementsReq {
  security_type: number;
  until: string;
  period: number;
  sort_by: number;
  limit: number;
  min_volume: number;
  min_variance: number;
  max_variance: number;
}

export interface WireCorrelReq {
  tickers: WireBasicTicker[];
  until: string;
  period: number;
}

export interface WireCorrelTickersReq {
  until: string;
  period: number;
  limit: number;
  min_volume: number;
  sign: number;
}

export interface WireStockSplitReq {
  from: string;
  until: string;
  limit: number;
}

export interface WireId {
  id: string;
}

export interface WirePortfolioReq {
  filter: string;
}

export interface WireCreatePortfolioReq {
  name: string;
  description: string;
}

export interface WirePortfolioSecurity {
  portfolio_id: string;
  security_type: number;
  ticker: string;
  volume: number;
  purchase_date: string;
  sell_date: string;
}

export interface WireProfitSecurity {
  ticker: string;
  security_type: number;
  volume: number;
  purchase_date: string;
  sell_date?: string;
}

export interface WireSecurityProfitReq {
  securities: WireProfitSecurity[];
  until: string;
  partition: number;
}

// ═══════════════════════════════════════════════════════════════
// RESPONSE DECODERS
// ═══════════════════════════════════════════════════════════════

const str = z.string().default('');
const num = z.number().default(0);

export const TickerMsgSchema = z.object({
  name: str,
  ticker: str,
  security_type: num,
  custom_fields: z.record(z.string()).default({}),
});
export type TickerMsg = z.infer<typeof TickerMsgSchema>;

export const BasicTickerMsgSchema = z.object({
  ticker: str,
  security_type: num,
});
export type BasicTickerMsg = z.infer<typeof BasicTickerMsgSchema>;

export const TimeSeriesDataMsgSchema = z.object({
  date: str,
  values: z.record(z.number()).default({}),
});
export type TimeSeriesDataMsg = z.infer<typeof TimeSeriesDataMsgSchema>;

export const DateMsgSchema = z.object({
  date: str,
});

export const MovementMsgSchema = z.object({
  ticker: str,
  // not part of every backend build; empty when missing
  name: str,
  security_type: num,
  date: str,
  period: num,
  performance: num,
  average: num,
  volume: num,
  variance: num,
  stddev: num,
  movement_exists: z.boolean().default(false),
});
export type MovementMsg = z.infer<typeof MovementMsgSchema>;

export const MovementsMsgSchema = z.object({
  movements: z.array(MovementMsgSchema).default([]),
});

// Message-typed fields decode to null when the backend leaves them unset.
export const CorrelMsgSchema = z.object({
  ticker0: BasicTickerMsgSchema.nullish(),
  ticker1: BasicTickerMsgSchema.nullish(),
  correl: num,
  date: str,
  period: num,
  correl_exists: z.boolean().default(false),
  volume0: num,
  volume1: num,
});
export type CorrelMsg = z.infer<typeof CorrelMsgSchema>;

export const DetailedCorrelMsgSchema = z.object({
  ticker0: TickerMsgSchema.nullish(),
  ticker1: TickerMsgSchema.nullish(),
  correl: num,
  date: str,
  period: num,
});
export type DetailedCorrelMsg = z.infer<typeof DetailedCorrelMsgSchema>;

export const MutualCorrelMsgSchema = z.object({
  ticker: TickerMsgSchema.nullish(),
  correlations: z.array(DetailedCorrelMsgSchema).default([]),
  volatility: num,
  stddev: num,
  performance: num,
  volume: num,
});
export type MutualCorrelMsg = z.infer<typeof MutualCorrelMsgSchema>;

export const MutualCorrelsMsgSchema = z.object({
  correls: z.array(MutualCorrelMsgSchema).default([]),
});

export const StockSplitMsgSchema = z.object({
  ticker: str,
  date: str,
  numerator: num,
  denominator: num,
});
export type StockSplitMsg = z.infer<typeof StockSplitMsgSchema>;

export const StockSplitsMsgSchema = z.object({
  splits: z.array(StockSplitMsgSchema).default([]),
});

export const PortfolioMetaMsgSchema = z.object({
  id: str,
  name: str,
  description: str,
});
export type PortfolioMetaMsg = z.infer<typeof PortfolioMetaMsgSchema>;

export const PortfolioMetasMsgSchema = z.object({
  portfolios: z.array(PortfolioMetaMsgSchema).default([]),
});

export const PortfolioSecurityMsgSchema = z.object({
  portfolio_id: str,
  security_type: num,
  ticker: str,
  volume: num,
  purchase_date: str,
  sell_date: str,
});
export type PortfolioSecurityMsg = z.infer<typeof PortfolioSecurityMsgSchema>;

export const PortfolioSecuritiesMsgSchema = z.object({
  securities: z.array(PortfolioSecurityMsgSchema).default([]),
});

export const SecurityProfitMsgSchema = z.object({
  ticker: str,
  security_type: num,
  volume: num,
  purchase_date: str,
  until: str,
  purchase_price: num,
  until_price: num,
  profit_per_share: num,
  total_profit: num,
});
export type SecurityProfitMsg = z.infer<typeof SecurityProfitMsgSchema>;

export const SecurityProfitsMsgSchema = z.object({
  profits: z.array(SecurityProfitMsgSchema).default([]),
});

export const SuccessRespMsgSchema = z.object({});
