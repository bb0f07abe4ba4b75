/**
 * Stock-split movement filter
 *
 * Movements of tickers that split inside the lookback window
 * [until - duration(period), until] are distorted by the split; callers can
 * ask for them to be dropped. Only the aggregate security type qualifies.
 */

import { RequestValidationError, errorMessage } from '../../../common/errors.js';
import { subtractDuration } from '../../../common/time.js';
import type { MovementMsg, PeriodCode, StockSplitMsg } from '../../../clients/dataloader.wire.js';
import { AGGREGATE_SECURITY_TYPE, PERIOD_DURATION_MS, type MovementsReq } from '../contracts/trading.types.js';

export function appliesStockSplitFilter(req: Pick<MovementsReq, 'security_type' | 'without_stock_splits'>): boolean {
  return req.security_type === AGGREGATE_SECURITY_TYPE && req.without_stock_splits === true;
}

export function lookbackStart(until: string, period: PeriodCode): string {
  try {
    return subtractDuration(until, PERIOD_DURATION_MS[period]);
  } catch (err) {
    throw new RequestValidationError('until', errorMessage(err));
  }
}

export function splitTickers(splits: StockSplitMsg[]): Set<string> {
  return new Set(splits.map((split) => split.ticker));
}

/**
 * Drop movements whose ticker split; survivors keep their order.
 */
export function withoutSplitTickers(movements: MovementMsg[], tickers: Set<string>): MovementMsg[] {
  if (tickers.size === 0) {
    return movements;
  }
  return movements.filter((movement) => !tickers.has(movement.ticker));
}
