/**
 * TRADING — REST Contracts
 * ========================
 *
 * Request schemas (zod, validated by the zod plugin) and response shapes of
 * the REST surface. Field names are snake_case, like the backend contract.
 */

import { z } from 'zod';
import { DAY_MS, HOUR_MS, MINUTE_MS } from '../../../common/time.js';
import { Period, TickerType, type PeriodCode } from '../../../clients/dataloader.wire.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_TICKER_LIMIT = 100;
export const DEFAULT_TRADED_WITHIN_PAST_N_DAYS = 10;
export const DEFAULT_CORRELATING_TICKERS_LIMIT = 100;
export const DEFAULT_STOCK_SPLITS_LIMIT = 100;

/** Security type whose movements can be cleaned of stock-split tickers */
export const AGGREGATE_SECURITY_TYPE = TickerType.STOCK;

// ═══════════════════════════════════════════════════════════════
// PERIODS
// ═══════════════════════════════════════════════════════════════

export const PERIOD_DURATION_MS: Record<PeriodCode, number> = {
  [Period.YEAR]: 365 * DAY_MS,
  [Period.SEMI_ANNUAL]: 180 * DAY_MS,
  [Period.QUARTER]: 90 * DAY_MS,
  [Period.MONTH]: 30 * DAY_MS,
  [Period.WEEK]: 7 * DAY_MS,
  [Period.DAY]: DAY_MS,
  [Period.HOUR]: HOUR_MS,
  [Period.MINUTE]: MINUTE_MS,
};

export function isPeriodCode(code: number): code is PeriodCode {
  return Object.prototype.hasOwnProperty.call(PERIOD_DURATION_MS, code);
}

// ═══════════════════════════════════════════════════════════════
// REQUEST SCHEMAS
// ═══════════════════════════════════════════════════════════════

const code = z.number().int().min(0);
const periodCode = z
  .number()
  .int()
  .refine(isPeriodCode, { message: 'unknown period code' });
const count = z.number().int().min(0);

export const BasicTickerSchema = z.object({
  ticker: z.string().min(1),
  security_type: code,
});
export type BasicTicker = z.infer<typeof BasicTickerSchema>;

export const TickerFilterSchema = z.object({
  security_type: code,
  filter: z.string().optional(),
  limit: count.optional(),
  traded_within_past_n_days: count.optional(),
});
export type TickerFilter = z.infer<typeof TickerFilterSchema>;

export const TimeSeriesReqSchema = z.object({
  ticker: BasicTickerSchema,
  from: z.string(),
  until: z.string(),
  intraday: z.boolean().optional(),
});
export type TimeSeriesReq = z.infer<typeof TimeSeriesReqSchema>;

export const LatestDateReqSchema = z.object({
  ticker: z.string().min(1),
  security_type: code,
  intraday: z.boolean().optional(),
});
export type LatestDateReq = z.infer<typeof LatestDateReqSchema>;

export const MovementReqSchema = z.object({
  ticker: z.string().min(1),
  security_type: code,
  until: z.string(),
  period: periodCode,
});
export type MovementReq = z.infer<typeof MovementReqSchema>;

export const MovementsReqSchema = z.object({
  security_type: code,
  sort_by: z.number().int().min(0).max(4),
  until: z.string(),
  period: periodCode,
  limit: count,
  min_volume: count,
  min_variance: z.number().optional(),
  max_variance: z.number().optional(),
  without_stock_splits: z.boolean().optional(),
});
export type MovementsReq = z.infer<typeof MovementsReqSchema>;

export const CorrelatingTickersReqSchema = z.object({
  until: z.string(),
  period: periodCode,
  limit: count.optional(),
  min_volume: count.optional(),
  sign: z.number().int().min(0).max(2).optional(),
});
export type CorrelatingTickersReq = z.infer<typeof CorrelatingTickersReqSchema>;

export const CorrelReqSchema = z.object({
  tickers: z.array(BasicTickerSchema).optional(),
  until: z.string().optional(),
  period: periodCode,
});
export type CorrelReq = z.infer<typeof CorrelReqSchema>;

export const StockSplitsReqSchema = z.object({
  from: z.string(),
  until: z.string(),
  limit: count.optional(),
});
export type StockSplitsReq = z.infer<typeof StockSplitsReqSchema>;

export const PortfolioIdSchema = z.object({
  id: z.string().min(1),
});

export const PortfolioFilterSchema = z.object({
  filter: z.string().optional(),
});

export const CreatePortfolioSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
});
export type CreatePortfolioReq = z.infer<typeof CreatePortfolioSchema>;

export const PortfolioSecuritySchema = z.object({
  portfolio_id: z.string().min(1),
  security_type: code,
  ticker: z.string().min(1),
  volume: z.number(),
  purchase_date: z.string(),
  sell_date: z.string().optional(),
});
export type PortfolioSecurityReq = z.infer<typeof PortfolioSecuritySchema>;

/**
 * Older clients send `util` and `parition`; they are read as `until` and
 * `partition` when the canonical key is absent.
 */
function withLegacyProfitKeys(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }
  const body: Record<string, unknown> = { ...input };
  if (body.until === undefined && body.util !== undefined) {
    body.until = body.util;
  }
  if (body.partition === undefined && body.parition !== undefined) {
    body.partition = body.parition;
  }
  return body;
}

export const SecurityProfitReqSchema = z.preprocess(
  withLegacyProfitKeys,
  z.object({
    until: z.string(),
    partition: periodCode,
    securities: z.array(
      z.object({
        ticker: z.string().min(1),
        security_type: code,
        volume: z.number(),
        purchase_date: z.string().optional(),
        sell_date: z.string().optional(),
      }),
    ),
  }),
);
export type SecurityProfitReq = z.infer<typeof SecurityProfitReqSchema>;

// ═══════════════════════════════════════════════════════════════
// RESPONSE SHAPES
// ═══════════════════════════════════════════════════════════════

/**
 * Custom string fields are flattened next to the core keys.
 * `name` is null for tickers known only by identity.
 */
export interface Ticker {
  ticker: string;
  name: string | null;
  security_type: number;
  [customField: string]: string | number | null;
}

export interface TimeSeriesData {
  date: string;
  values: Record<string, number>;
}

export interface Movement {
  ticker: Ticker;
  performance: number;
  average: number;
  volume: number;
  variance: number;
  stddev: number;
  date: string;
  period: number;
}

export interface CorrelatingTickers {
  tickers: [Ticker, Ticker];
  correlation: number;
  date: string;
  period: number;
  volume0: number;
  volume1: number;
}

export interface DetailedCorrel {
  ticker0: Ticker;
  ticker1: Ticker;
  date: string;
  period: number;
  correlation: number;
}

export interface MutualCorrel {
  ticker: Ticker;
  correlations: DetailedCorrel[];
  volatility: number;
  stddev: number;
  performance: number;
  volume: number;
}

export interface StockSplit {
  ticker: string;
  date: string;
  numerator: number;
  denominator: number;
}

export interface Portfolio {
  id: string;
  name: string;
  description: string;
}

export interface PortfolioSecurity {
  portfolio_id: string;
  security_type: number;
  ticker: string;
  volume: number;
  purchase_date: string;
  sell_date: string;
}

export interface SecurityProfit {
  ticker: string;
  security_type: number;
  volume: number;
  purchase_date: string;
  until: string;
  purchase_price: number;
  until_price: number;
  profit_per_share: number;
  total_profit: number;
}

export interface LatestDate {
  date: string;
}

export interface SuccessResponse {
  success: boolean;
  error: string | null;
}
