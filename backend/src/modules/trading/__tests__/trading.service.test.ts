import { describe, it, expect, beforeEach } from 'vitest';
import { RequestValidationError, TranslationError, UpstreamError } from '../../../common/errors.js';
import type { CallOptions } from '../../../clients/dataloader.client.js';
import type { MutualCorrelMsg, StockSplitMsg, WireTickerFilter } from '../../../clients/dataloader.wire.js';
import { TradingService } from '../services/trading.service.js';
import type { MovementsReq } from '../contracts/trading.types.js';
import {
  createFakeClient,
  createFakeConnector,
  createMockLogger,
  movementMsg,
  streamOf,
  tickerMsg,
  type FakeClient,
} from './test-utils.js';

const split = (ticker: string, date: string): StockSplitMsg => ({ ticker, date, numerator: 2, denominator: 1 });

const baseMovementsReq: MovementsReq = {
  security_type: 0,
  sort_by: 0,
  until: '2024-01-31',
  period: 3,
  limit: 3,
  min_volume: 0,
};

function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    stream.on('data', (chunk: string) => {
      body += chunk;
    });
    stream.on('end', () => resolve(body));
    stream.on('error', reject);
  });
}

describe('TradingService', () => {
  let client: FakeClient;
  let connector: ReturnType<typeof createFakeConnector>;
  let logger: ReturnType<typeof createMockLogger>;
  let service: TradingService;

  beforeEach(() => {
    client = createFakeClient();
    connector = createFakeConnector(client);
    logger = createMockLogger();
    service = new TradingService(connector, { logger, stockSplitLookupLimit: 10_000 });
  });

  // ═══════════════════════════════════════════════════════════════
  // MOVEMENTS + STOCK-SPLIT FILTER
  // ═══════════════════════════════════════════════════════════════

  describe('movements', () => {
    beforeEach(() => {
      client.getMovements.mockResolvedValue([movementMsg('AAA', 0.3), movementMsg('XYZ', 0.2), movementMsg('BBB', 0.1)]);
      client.getStockSplits.mockResolvedValue([split('XYZ', '2024-01-15')]);
    });

    it('drops tickers that split in the lookback window', async () => {
      const movements = await service.movements({ ...baseMovementsReq, without_stock_splits: true });

      expect(movements.map((m) => m.ticker.ticker)).toEqual(['AAA', 'BBB']);
      expect(client.getStockSplits).toHaveBeenCalledTimes(1);
      expect(client.getStockSplits.mock.calls[0]?.[0]).toEqual({
        from: '2024-01-01',
        until: '2024-01-31',
        limit: 10_000,
      });
    });

    it('uses one client for both backend calls and closes it', async () => {
      await service.movements({ ...baseMovementsReq, without_stock_splits: true });

      expect(connector.connect).toHaveBeenCalledTimes(1);
      expect(client.close).toHaveBeenCalledTimes(1);
    });

    it('passes the request through with defaults filled in', async () => {
      await service.movements({ ...baseMovementsReq, min_variance: 0.5 });

      expect(client.getMovements.mock.calls[0]?.[0]).toEqual({
        security_type: 0,
        until: '2024-01-31',
        period: 3,
        sort_by: 0,
        limit: 3,
        min_volume: 0,
        min_variance: 0.5,
        max_variance: 0,
      });
    });

    it('skips the split lookup when the flag is off', async () => {
      const movements = await service.movements(baseMovementsReq);

      expect(movements.map((m) => m.ticker.ticker)).toEqual(['AAA', 'XYZ', 'BBB']);
      expect(client.getStockSplits).not.toHaveBeenCalled();
    });

    it('skips the split lookup for other security types', async () => {
      await service.movements({ ...baseMovementsReq, security_type: 1, without_stock_splits: true });

      expect(client.getStockSplits).not.toHaveBeenCalled();
    });

    it('applies the filter to average movements', async () => {
      client.getAvgMovements.mockResolvedValue([movementMsg('XYZ'), movementMsg('CCC')]);

      const movements = await service.avgMovements({ ...baseMovementsReq, without_stock_splits: true });

      expect(movements.map((m) => m.ticker.ticker)).toEqual(['CCC']);
      expect(client.getMovements).not.toHaveBeenCalled();
    });

    it('derives a timestamp window for intraday periods', async () => {
      await service.movements({ ...baseMovementsReq, period: 6, without_stock_splits: true });

      expect(client.getStockSplits.mock.calls[0]?.[0]).toMatchObject({ from: '2024-01-30T23:00:00' });
    });

    it('rejects an invalid until before calling the backend', async () => {
      const result = service.movements({ ...baseMovementsReq, until: 'soon', without_stock_splits: true });

      await expect(result).rejects.toBeInstanceOf(RequestValidationError);
      expect(connector.connect).not.toHaveBeenCalled();
    });

    it('fails the request when the split lookup fails', async () => {
      client.getStockSplits.mockRejectedValue(new Error('split table locked'));

      const result = service.movements({ ...baseMovementsReq, without_stock_splits: true });

      await expect(result).rejects.toThrow('GetMovements: split table locked');
      expect(client.close).toHaveBeenCalledTimes(1);
    });

    it('forwards the caller signal to every backend call', async () => {
      const options: CallOptions = { signal: new AbortController().signal };

      await service.movements({ ...baseMovementsReq, without_stock_splits: true }, options);

      expect(client.getMovements.mock.calls[0]?.[1]).toBe(options);
      expect(client.getStockSplits.mock.calls[0]?.[1]).toBe(options);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // STREAMS
  // ═══════════════════════════════════════════════════════════════

  describe('tickers', () => {
    it('streams flattened tickers and closes the client at the end', async () => {
      client.getTickers.mockImplementation((req: WireTickerFilter) =>
        streamOf([tickerMsg('AAA', { sector: 'Tech' }), tickerMsg('BBB')].slice(0, req.limit)),
      );

      const stream = await service.tickers({ security_type: 0 });
      const body = await readAll(stream);

      expect(body).toBe(
        '[{"ticker":"AAA","name":"AAA Inc.","security_type":0,"sector":"Tech"},' +
          '{"ticker":"BBB","name":"BBB Inc.","security_type":0}]',
      );
      expect(client.getTickers.mock.calls[0]?.[0]).toEqual({
        ticker_type: 0,
        filter: '',
        limit: 100,
        traded_within_past_n_days: 10,
      });
      expect(client.close).toHaveBeenCalledTimes(1);
    });

    it('rejects when the backend fails before the first item', async () => {
      client.getTickers.mockImplementation(() => streamOf([], { failAt: 0, error: new Error('UNAVAILABLE') }));

      const result = service.tickers({ security_type: 0 });

      await expect(result).rejects.toBeInstanceOf(UpstreamError);
      await expect(result).rejects.toThrow('GetTickers: UNAVAILABLE');
      expect(client.close).toHaveBeenCalledTimes(1);
    });

    it('cancels the backend call when the response stream is destroyed', async () => {
      let signal: AbortSignal | undefined;
      client.getTickers.mockImplementation((_req: WireTickerFilter, options?: CallOptions) => {
        signal = options?.signal;
        return streamOf([tickerMsg('AAA'), tickerMsg('BBB'), tickerMsg('CCC')]);
      });

      const stream = await service.tickers({ security_type: 0 });
      await new Promise<void>((resolve) => {
        stream.on('close', resolve);
        stream.destroy();
      });

      expect(signal?.aborted).toBe(true);
      expect(client.close).toHaveBeenCalledTimes(1);
    });

    it('cancels the backend call when the caller aborts before the first item', async () => {
      let signal: AbortSignal | undefined;
      client.getTickers.mockImplementation(async function* (_req: WireTickerFilter, options?: CallOptions) {
        signal = options?.signal;
        await new Promise((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('CANCELLED')));
        });
        yield tickerMsg('AAA');
      });
      const controller = new AbortController();

      const result = service.tickers({ security_type: 0 }, { signal: controller.signal });
      setTimeout(() => controller.abort(), 10);

      await expect(result).rejects.toBeInstanceOf(UpstreamError);
      await expect(result).rejects.toThrow('GetTickers: CANCELLED');
      expect(signal?.aborted).toBe(true);
      expect(client.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('correlatingTickers', () => {
    it('fills defaults and marks correlations without ticker identity', async () => {
      client.getCorrelatingTickers.mockImplementation(() =>
        streamOf([
          {
            ticker0: { ticker: 'AAA', security_type: 0 },
            ticker1: { ticker: 'BBB', security_type: 0 },
            correl: 0.9,
            date: '2024-01-31',
            period: 3,
          },
          { ticker0: { ticker: 'AAA', security_type: 0 }, ticker1: null, correl: 0.5 },
        ]),
      );

      const stream = await service.correlatingTickers({ until: '2024-01-31', period: 3 });
      const parsed: unknown = JSON.parse(await readAll(stream));

      expect(client.getCorrelatingTickers.mock.calls[0]?.[0]).toEqual({
        until: '2024-01-31',
        period: 3,
        limit: 100,
        min_volume: 0,
        sign: 0,
      });
      expect(parsed).toEqual([
        {
          tickers: [
            { ticker: 'AAA', name: null, security_type: 0 },
            { ticker: 'BBB', name: null, security_type: 0 },
          ],
          correlation: 0.9,
          date: '2024-01-31',
          period: 3,
          volume0: 0,
          volume1: 0,
        },
        {
          error: {
            code: 'SERIALIZATION_ERROR',
            message: 'Translation failed: ticker1 - correlation without ticker identity',
          },
        },
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // UNARY
  // ═══════════════════════════════════════════════════════════════

  describe('mutualCorrelations', () => {
    it('fails the whole response when one correlation lacks a ticker', async () => {
      const anchor = tickerMsg('AAA');
      const correls: MutualCorrelMsg[] = [
        { ticker: anchor, correlations: [], volatility: 0, stddev: 0, performance: 0, volume: 0 },
        {
          ticker: anchor,
          correlations: [{ ticker0: anchor, ticker1: null, correl: 0.4, date: '2024-01-31', period: 3 }],
          volatility: 0,
          stddev: 0,
          performance: 0,
          volume: 0,
        },
      ];
      client.getMutualCorrelations.mockResolvedValue(correls);

      const result = service.mutualCorrelations({ period: 3 });

      await expect(result).rejects.toBeInstanceOf(TranslationError);
      await expect(result).rejects.toThrow(
        'Translation failed: correls[1].correlations[0].ticker1 - missing ticker identity',
      );
      expect(client.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('tickerDetails', () => {
    it('returns the flattened ticker', async () => {
      client.getTickerDetails.mockResolvedValue(tickerMsg('AAA', { country: 'US' }));

      const ticker = await service.tickerDetails({ ticker: 'AAA', security_type: 0 });

      expect(ticker).toEqual({ ticker: 'AAA', name: 'AAA Inc.', security_type: 0, country: 'US' });
      expect(client.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('stockSplits', () => {
    it('defaults the limit to 100', async () => {
      client.getStockSplits.mockResolvedValue([{ ticker: 'XYZ', date: '2024-01-15', numerator: 2, denominator: 1 }]);

      const splits = await service.stockSplits({ from: '2024-01-01', until: '2024-01-31' });

      expect(splits).toEqual([{ ticker: 'XYZ', date: '2024-01-15', numerator: 2, denominator: 1 }]);
      expect(client.getStockSplits.mock.calls[0]?.[0]).toEqual({ from: '2024-01-01', until: '2024-01-31', limit: 100 });
    });
  });

  describe('latestSecurityDataDate', () => {
    it('wraps the date and defaults intraday to false', async () => {
      client.getLatestSecurityDataDate.mockResolvedValue('2024-04-16');

      const latest = await service.latestSecurityDataDate({ ticker: 'AAA', security_type: 0 });

      expect(latest).toEqual({ date: '2024-04-16' });
      expect(client.getLatestSecurityDataDate.mock.calls[0]?.[0]).toEqual({
        ticker: 'AAA',
        security_type: 0,
        intraday: false,
      });
    });
  });

  describe('portfolios', () => {
    it('sends an empty sell date for open positions', async () => {
      client.buySecurity.mockResolvedValue(undefined);

      await service.buySecurity({
        portfolio_id: 'p-1',
        security_type: 0,
        ticker: 'AAA',
        volume: 10,
        purchase_date: '2024-01-02',
      });

      expect(client.buySecurity.mock.calls[0]?.[0]).toEqual({
        portfolio_id: 'p-1',
        security_type: 0,
        ticker: 'AAA',
        volume: 10,
        purchase_date: '2024-01-02',
        sell_date: '',
      });
    });

    it('creates portfolios with an empty description by default', async () => {
      client.createPortfolio.mockResolvedValue({ id: 'p-2', name: 'Income', description: '' });

      await expect(service.createPortfolio({ name: 'Income' })).resolves.toEqual({
        id: 'p-2',
        name: 'Income',
        description: '',
      });
      expect(client.createPortfolio.mock.calls[0]?.[0]).toEqual({ name: 'Income', description: '' });
    });

    it('lists the securities of a portfolio', async () => {
      client.getPortfolioSecurities.mockResolvedValue([
        {
          portfolio_id: 'p-1',
          security_type: 0,
          ticker: 'AAA',
          volume: 10,
          purchase_date: '2024-01-02',
          sell_date: '',
        },
      ]);

      const securities = await service.portfolioSecurities('p-1');

      expect(securities).toEqual([
        { portfolio_id: 'p-1', security_type: 0, ticker: 'AAA', volume: 10, purchase_date: '2024-01-02', sell_date: '' },
      ]);
      expect(client.getPortfolioSecurities.mock.calls[0]?.[0]).toEqual({ id: 'p-1' });
    });

    it('computes profits through the backend', async () => {
      client.getPortfolioProfits.mockResolvedValue([
        {
          ticker: 'AAA',
          security_type: 0,
          volume: 10,
          purchase_date: '2024-01-02',
          until: '2024-03-28',
          purchase_price: 100,
          until_price: 110,
          profit_per_share: 10,
          total_profit: 100,
        },
      ]);

      const profits = await service.portfolioProfits({
        until: '2024-03-28',
        partition: 5,
        securities: [{ ticker: 'AAA', security_type: 0, volume: 10, purchase_date: '2024-01-02' }],
      });

      expect(profits[0]?.total_profit).toBe(100);
      expect(profits[0]?.until_price).toBe(110);
    });

    it('maps portfolio listings', async () => {
      client.getPortfolios.mockResolvedValue([{ id: 'p-1', name: 'Growth', description: '' }]);

      await expect(service.portfolios('gro')).resolves.toEqual([{ id: 'p-1', name: 'Growth', description: '' }]);
      expect(client.getPortfolios.mock.calls[0]?.[0]).toEqual({ filter: 'gro' });
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // FAILURES
  // ═══════════════════════════════════════════════════════════════

  describe('backend failures', () => {
    it('reports an unreachable backend as UpstreamError', async () => {
      connector.connect.mockRejectedValue(new Error('ECONNREFUSED'));

      const result = service.portfolio('p-1');

      await expect(result).rejects.toBeInstanceOf(UpstreamError);
      await expect(result).rejects.toThrow('connect: ECONNREFUSED');
    });

    it('wraps unexpected rpc failures with the rpc name', async () => {
      client.getPortfolio.mockRejectedValue(new Error('socket hang up'));

      const result = service.portfolio('p-1');

      await expect(result).rejects.toMatchObject({ statusCode: 502, code: 'UPSTREAM_ERROR' });
      await expect(result).rejects.toThrow('GetPortfolio: socket hang up');
      expect(client.close).toHaveBeenCalledTimes(1);
    });
  });
});
