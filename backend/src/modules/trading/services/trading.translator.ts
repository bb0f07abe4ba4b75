/**
 * TRADING — Schema Translator
 * ===========================
 *
 * Pure mapping between REST shapes and DataLoader wire messages.
 *
 * Request direction fills the documented defaults.
 * Response direction enforces the invariants the REST surface relies on:
 * a correlation without both ticker identities is rejected, never emitted
 * with a null ticker.
 */

import type { ZodTypeAny, output } from 'zod';
import { TranslationError } from '../../../common/errors.js';
import {
  CorrelMsgSchema,
  CorrelSign,
  TickerMsgSchema,
  TimeSeriesDataMsgSchema,
  type BasicTickerMsg,
  type CorrelMsg,
  type DetailedCorrelMsg,
  type MovementMsg,
  type MutualCorrelMsg,
  type PortfolioMetaMsg,
  type PortfolioSecurityMsg,
  type SecurityProfitMsg,
  type StockSplitMsg,
  type TickerMsg,
  type TimeSeriesDataMsg,
  type WireBasicTicker,
  type WireCorrelReq,
  type WireCorrelTickersReq,
  type WireCreatePortfolioReq,
  type WireDateReq,
  type WireMovementReq,
  type WireMovementsReq,
  type WirePortfolioSecurity,
  type WireSecurityProfitReq,
  type WireStockSplitReq,
  type WireTickerFilter,
  type WireTimeSeriesReq,
} from '../../../clients/dataloader.wire.js';
import {
  DEFAULT_CORRELATING_TICKERS_LIMIT,
  DEFAULT_STOCK_SPLITS_LIMIT,
  DEFAULT_TICKER_LIMIT,
  DEFAULT_TRADED_WITHIN_PAST_N_DAYS,
  type BasicTicker,
  type CorrelReq,
  type CorrelatingTickers,
  type CorrelatingTickersReq,
  type CreatePortfolioReq,
  type DetailedCorrel,
  type LatestDateReq,
  type Movement,
  type MovementReq,
  type MovementsReq,
  type MutualCorrel,
  type Portfolio,
  type PortfolioSecurity,
  type PortfolioSecurityReq,
  type SecurityProfit,
  type SecurityProfitReq,
  type StockSplit,
  type StockSplitsReq,
  type Ticker,
  type TickerFilter,
  type TimeSeriesData,
  type TimeSeriesReq,
} from '../contracts/trading.types.js';

// ═══════════════════════════════════════════════════════════════
// REQUEST DIRECTION
// ═══════════════════════════════════════════════════════════════

export function toWireTickerFilter(filter: TickerFilter): WireTickerFilter {
  return {
    ticker_type: filter.security_type,
    filter: filter.filter ?? '',
    limit: filter.limit ?? DEFAULT_TICKER_LIMIT,
    traded_within_past_n_days: filter.traded_within_past_n_days ?? DEFAULT_TRADED_WITHIN_PAST_N_DAYS,
  };
}

export function toWireBasicTicker(ticker: BasicTicker): WireBasicTicker {
  return { ticker: ticker.ticker, security_type: ticker.security_type };
}

export function toWireTimeSeriesReq(req: TimeSeriesReq): WireTimeSeriesReq {
  return {
    ticker: toWireBasicTicker(req.ticker),
    from_date: req.from,
    until_date: req.until,
    intraday: req.intraday ?? true,
  };
}

export function toWireDateReq(req: LatestDateReq): WireDateReq {
  return {
    ticker: req.ticker,
    security_type: req.security_type,
    intraday: req.intraday ?? false,
  };
}

export function toWireMovementReq(req: MovementReq): WireMovementReq {
  return {
    ticker: req.ticker,
    security_type: req.security_type,
    until: req.until,
    period: req.period,
  };
}

export function toWireMovementsReq(req: MovementsReq): WireMovementsReq {
  return {
    security_type: req.security_type,
    until: req.until,
    period: req.period,
    sort_by: req.sort_by,
    limit: req.limit,
    min_volume: req.min_volume,
    min_variance: req.min_variance ?? 0,
    max_variance: req.max_variance ?? 0,
  };
}

export function toWireCorrelTickersReq(req: CorrelatingTickersReq): WireCorrelTickersReq {
  return {
    until: req.until,
    period: req.period,
    limit: req.limit ?? DEFAULT_CORRELATING_TICKERS_LIMIT,
    min_volume: req.min_volume ?? 0,
    sign: req.sign ?? CorrelSign.ABS,
  };
}

export function toWireCorrelReq(req: CorrelReq): WireCorrelReq {
  return {
    tickers: (req.tickers ?? []).map(toWireBasicTicker),
    until: req.until ?? '',
    period: req.period,
  };
}

export function toWireStockSplitReq(req: StockSplitsReq): WireStockSplitReq {
  return {
    from: req.from,
    until: req.until,
    limit: req.limit ?? DEFAULT_STOCK_SPLITS_LIMIT,
  };
}

export function toWireCreatePortfolioReq(req: CreatePortfolioReq): WireCreatePortfolioReq {
  return { name: req.name, description: req.description ?? '' };
}

export function toWirePortfolioSecurity(security: PortfolioSecurityReq): WirePortfolioSecurity {
  return {
    portfolio_id: security.portfolio_id,
    security_type: security.security_type,
    ticker: security.ticker,
    volume: security.volume,
    purchase_date: security.purchase_date,
    sell_date: security.sell_date ?? '',
  };
}

export function toWireSecurityProfitReq(req: SecurityProfitReq): WireSecurityProfitReq {
  return {
    until: req.until,
    partition: req.partition,
    securities: req.securities.map((s) => ({
      ticker: s.ticker,
      security_type: s.security_type,
      volume: s.volume,
      purchase_date: s.purchase_date ?? '',
      // proto3 optional: omitted when unsold
      ...(s.sell_date !== undefined ? { sell_date: s.sell_date } : {}),
    })),
  };
}

// ═══════════════════════════════════════════════════════════════
// RESPONSE DIRECTION
// ═══════════════════════════════════════════════════════════════

export function fromTickerMsg(msg: TickerMsg): Ticker {
  const ticker: Ticker = {
    ticker: msg.ticker,
    name: msg.name,
    security_type: msg.security_type,
  };
  for (const [field, value] of Object.entries(msg.custom_fields)) {
    if (!Object.hasOwn(ticker, field)) {
      ticker[field] = value;
    }
  }
  return ticker;
}

export function fromBasicTickerMsg(msg: BasicTickerMsg): Ticker {
  return { ticker: msg.ticker, name: null, security_type: msg.security_type };
}

export function fromTimeSeriesDataMsg(msg: TimeSeriesDataMsg): TimeSeriesData {
  return { date: msg.date, values: msg.values };
}

export function fromMovementMsg(msg: MovementMsg): Movement {
  return {
    ticker: {
      ticker: msg.ticker,
      name: msg.name,
      security_type: msg.security_type,
    },
    performance: msg.performance,
    average: msg.average,
    volume: msg.volume,
    variance: msg.variance,
    stddev: msg.stddev,
    date: msg.date,
    period: msg.period,
  };
}

export function fromCorrelMsg(msg: CorrelMsg): CorrelatingTickers {
  if (!msg.ticker0 || !msg.ticker1) {
    throw new TranslationError(msg.ticker0 ? 'ticker1' : 'ticker0', 'correlation without ticker identity');
  }
  return {
    tickers: [fromBasicTickerMsg(msg.ticker0), fromBasicTickerMsg(msg.ticker1)],
    correlation: msg.correl,
    date: msg.date,
    period: msg.period,
    volume0: msg.volume0,
    volume1: msg.volume1,
  };
}

export function fromDetailedCorrelMsg(msg: DetailedCorrelMsg, position: number): DetailedCorrel {
  if (!msg.ticker0) {
    throw new TranslationError(`correlations[${position}].ticker0`, 'missing ticker identity');
  }
  if (!msg.ticker1) {
    throw new TranslationError(`correlations[${position}].ticker1`, 'missing ticker identity');
  }
  return {
    ticker0: fromTickerMsg(msg.ticker0),
    ticker1: fromTickerMsg(msg.ticker1),
    date: msg.date,
    period: msg.period,
    correlation: msg.correl,
  };
}

export function fromMutualCorrelMsg(msg: MutualCorrelMsg): MutualCorrel {
  if (!msg.ticker) {
    throw new TranslationError('ticker', 'mutual correlation without anchor ticker');
  }
  return {
    ticker: fromTickerMsg(msg.ticker),
    correlations: msg.correlations.map(fromDetailedCorrelMsg),
    volatility: msg.volatility,
    stddev: msg.stddev,
    performance: msg.performance,
    volume: msg.volume,
  };
}

/**
 * All-or-nothing: one invalid bundle fails the whole response.
 */
export function fromMutualCorrelMsgs(msgs: MutualCorrelMsg[]): MutualCorrel[] {
  return msgs.map((msg, index) => {
    try {
      return fromMutualCorrelMsg(msg);
    } catch (err) {
      if (err instanceof TranslationError) {
        throw new TranslationError(`correls[${index}].${err.field}`, 'missing ticker identity');
      }
      throw err;
    }
  });
}

export function fromStockSplitMsg(msg: StockSplitMsg): StockSplit {
  return {
    ticker: msg.ticker,
    date: msg.date,
    numerator: msg.numerator,
    denominator: msg.denominator,
  };
}

export function fromPortfolioMetaMsg(msg: PortfolioMetaMsg): Portfolio {
  return { id: msg.id, name: msg.name, description: msg.description };
}

export function fromPortfolioSecurityMsg(msg: PortfolioSecurityMsg): PortfolioSecurity {
  return {
    portfolio_id: msg.portfolio_id,
    security_type: msg.security_type,
    ticker: msg.ticker,
    volume: msg.volume,
    purchase_date: msg.purchase_date,
    sell_date: msg.sell_date,
  };
}

export function fromSecurityProfitMsg(msg: SecurityProfitMsg): SecurityProfit {
  return {
    ticker: msg.ticker,
    security_type: msg.security_type,
    volume: msg.volume,
    purchase_date: msg.purchase_date,
    until: msg.until,
    purchase_price: msg.purchase_price,
    until_price: msg.until_price,
    profit_per_share: msg.profit_per_share,
    total_profit: msg.total_profit,
  };
}

// ═══════════════════════════════════════════════════════════════
// STREAM ITEM SERIALIZERS
// ═══════════════════════════════════════════════════════════════

function decodeItem<S extends ZodTypeAny>(message: string, schema: S, raw: object): output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new TranslationError(message, result.error.issues[0]?.message ?? 'undecodable stream item');
  }
  return result.data;
}

export function serializeTicker(raw: object): string {
  return JSON.stringify(fromTickerMsg(decodeItem('Ticker', TickerMsgSchema, raw)));
}

export function serializeTimeSeriesData(raw: object): string {
  return JSON.stringify(fromTimeSeriesDataMsg(decodeItem('TimeSeriesData', TimeSeriesDataMsgSchema, raw)));
}

export function serializeCorrel(raw: object): string {
  return JSON.stringify(fromCorrelMsg(decodeItem('Correl', CorrelMsgSchema, raw)));
}
