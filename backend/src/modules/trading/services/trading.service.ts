/**
 * TRADING SERVICE
 * ===============
 *
 * Orchestration facade over the DataLoader backend: one method per REST
 * capability. Every method obtains its own backend client and closes it when
 * the call (or, for streams, the response) is done.
 *
 * Streaming methods resolve to a JsonArrayStream once the backend has
 * produced its first message or ended; errors up to that point reject
 * the promise like any unary call.
 */

import { AppError, UpstreamError, errorMessage } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import {
  toUpstreamError,
  type BackendConnector,
  type BackendStream,
  type CallOptions,
  type DataLoaderClient,
} from '../../../clients/dataloader.client.js';
import type { MovementMsg, WireMovementsReq } from '../../../clients/dataloader.wire.js';
import {
  DEFAULT_STREAM_BUFFER,
  JsonArrayStream,
  type Serializer,
} from '../../../core/streaming/json-array.stream.js';
import type {
  BasicTicker,
  CorrelReq,
  CorrelatingTickersReq,
  CreatePortfolioReq,
  LatestDate,
  LatestDateReq,
  Movement,
  MovementReq,
  MovementsReq,
  MutualCorrel,
  Portfolio,
  PortfolioSecurity,
  PortfolioSecurityReq,
  SecurityProfit,
  SecurityProfitReq,
  StockSplit,
  StockSplitsReq,
  Ticker,
  TickerFilter,
  TimeSeriesReq,
} from '../contracts/trading.types.js';
import { appliesStockSplitFilter, lookbackStart, splitTickers, withoutSplitTickers } from './stock-split.filter.js';
import {
  fromMovementMsg,
  fromMutualCorrelMsgs,
  fromPortfolioMetaMsg,
  fromPortfolioSecurityMsg,
  fromSecurityProfitMsg,
  fromStockSplitMsg,
  fromTickerMsg,
  serializeCorrel,
  serializeTicker,
  serializeTimeSeriesData,
  toWireBasicTicker,
  toWireCorrelReq,
  toWireCorrelTickersReq,
  toWireCreatePortfolioReq,
  toWireDateReq,
  toWireMovementReq,
  toWireMovementsReq,
  toWirePortfolioSecurity,
  toWireSecurityProfitReq,
  toWireStockSplitReq,
  toWireTickerFilter,
  toWireTimeSeriesReq,
} from './trading.translator.js';

// ═══════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════

export interface TradingServiceConfig {
  /** Streaming bridge buffer, in fragments */
  streamBufferSize: number;
  /** `limit` sent with the stock-split lookup of the movement filter */
  stockSplitLookupLimit: number;
  logger: Logger;
}

const DEFAULT_CONFIG: TradingServiceConfig = {
  streamBufferSize: DEFAULT_STREAM_BUFFER,
  stockSplitLookupLimit: 10_000,
  logger: defaultLogger,
};

const MOVEMENTS_RPC = {
  getMovements: 'GetMovements',
  getAvgMovements: 'GetAvgMovements',
} as const;

type MovementsRpc = keyof typeof MOVEMENTS_RPC;

async function* closeAfter(client: DataLoaderClient, stream: BackendStream): BackendStream {
  try {
    yield* stream;
  } finally {
    client.close();
  }
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class TradingService {
  private readonly config: TradingServiceConfig;

  constructor(
    private readonly connector: BackendConnector,
    config: Partial<TradingServiceConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // ─────────────────────────────────────────────────────────────
  // Plumbing
  // ─────────────────────────────────────────────────────────────

  private async connect(): Promise<DataLoaderClient> {
    try {
      return await this.connector.connect();
    } catch (err) {
      if (err instanceof AppError) {
        throw err;
      }
      throw new UpstreamError('connect', errorMessage(err), { cause: err });
    }
  }

  /**
   * Run one unary operation on a fresh client.
   */
  private async withClient<T>(rpc: string, fn: (client: DataLoaderClient) => Promise<T>): Promise<T> {
    const client = await this.connect();
    try {
      return await fn(client);
    } catch (err) {
      if (err instanceof AppError) {
        throw err;
      }
      throw toUpstreamError(rpc, err);
    } finally {
      client.close();
    }
  }

  /**
   * Bridge a server-streaming RPC into a JSON array body.
   * The client stays open until the stream ends or is destroyed.
   *
   * `options.signal` cancels the backend call while the first item is
   * awaited; afterwards, destroying the returned stream does.
   */
  private async openStream(
    rpc: string,
    call: (client: DataLoaderClient, options: CallOptions) => BackendStream,
    serialize: Serializer<object>,
    options?: CallOptions,
  ): Promise<JsonArrayStream<object>> {
    const client = await this.connect();
    const abortController = new AbortController();
    const signal = options?.signal;
    const onDisconnect = (): void => abortController.abort();
    signal?.addEventListener('abort', onDisconnect, { once: true });
    if (signal?.aborted) {
      abortController.abort();
    }

    const source = closeAfter(client, call(client, { signal: abortController.signal }));
    try {
      return await JsonArrayStream.open(source, serialize, {
        highWaterMark: this.config.streamBufferSize,
        abortController,
        logger: this.config.logger,
        label: rpc,
      });
    } catch (err) {
      this.config.logger.error({ rpc, err: errorMessage(err) }, 'stream failed before the first item');
      throw toUpstreamError(rpc, err);
    } finally {
      signal?.removeEventListener('abort', onDisconnect);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Tickers
  // ─────────────────────────────────────────────────────────────

  tickers(filter: TickerFilter, options?: CallOptions): Promise<JsonArrayStream<object>> {
    const req = toWireTickerFilter(filter);
    return this.openStream(
      'GetTickers',
      (client, callOptions) => client.getTickers(req, callOptions),
      serializeTicker,
      options,
    );
  }

  tickerDetails(ticker: BasicTicker, options?: CallOptions): Promise<Ticker> {
    return this.withClient('GetTickerDetails', async (client) =>
      fromTickerMsg(await client.getTickerDetails(toWireBasicTicker(ticker), options)),
    );
  }

  // ─────────────────────────────────────────────────────────────
  // Time series
  // ─────────────────────────────────────────────────────────────

  securityData(req: TimeSeriesReq, options?: CallOptions): Promise<JsonArrayStream<object>> {
    const wire = toWireTimeSeriesReq(req);
    return this.openStream(
      'GetSecurityData',
      (client, callOptions) => client.getSecurityData(wire, callOptions),
      serializeTimeSeriesData,
      options,
    );
  }

  latestSecurityDataDate(req: LatestDateReq, options?: CallOptions): Promise<LatestDate> {
    return this.withClient('GetLatestSecurityDataDate', async (client) => ({
      date: await client.getLatestSecurityDataDate(toWireDateReq(req), options),
    }));
  }

  // ─────────────────────────────────────────────────────────────
  // Movements
  // ─────────────────────────────────────────────────────────────

  movement(req: MovementReq, options?: CallOptions): Promise<Movement> {
    return this.withClient('GetMovement', async (client) =>
      fromMovementMsg(await client.getMovement(toWireMovementReq(req), options)),
    );
  }

  avgMovement(req: MovementReq, options?: CallOptions): Promise<Movement> {
    return this.withClient('GetAvgMovement', async (client) =>
      fromMovementMsg(await client.getAvgMovement(toWireMovementReq(req), options)),
    );
  }

  movements(req: MovementsReq, options?: CallOptions): Promise<Movement[]> {
    return this.filteredMovements('getMovements', req, options);
  }

  avgMovements(req: MovementsReq, options?: CallOptions): Promise<Movement[]> {
    return this.filteredMovements('getAvgMovements', req, options);
  }

  /**
   * Movements, minus tickers that split inside the lookback window when the
   * caller asks for it on the aggregate security type. The split lookup uses
   * the same `until` as the movements call and is skipped otherwise.
   */
  private async filteredMovements(method: MovementsRpc, req: MovementsReq, options?: CallOptions): Promise<Movement[]> {
    const rpc = MOVEMENTS_RPC[method];
    const wire: WireMovementsReq = toWireMovementsReq(req);
    const filterSplits = appliesStockSplitFilter(req);
    // validated before any backend round trip
    const from = filterSplits ? lookbackStart(req.until, req.period) : null;

    return this.withClient(rpc, async (client) => {
      let movements: MovementMsg[] = await client[method](wire, options);

      if (from !== null) {
        const splits = await client.getStockSplits(
          { from, until: req.until, limit: this.config.stockSplitLookupLimit },
          options,
        );
        const tickers = splitTickers(splits);
        const before = movements.length;
        movements = withoutSplitTickers(movements, tickers);
        this.config.logger.debug?.(
          { rpc, from, until: req.until, splitTickers: tickers.size, removed: before - movements.length },
          'stock-split filter applied',
        );
      }

      return movements.map(fromMovementMsg);
    });
  }

  // ─────────────────────────────────────────────────────────────
  // Correlations
  // ─────────────────────────────────────────────────────────────

  correlations(req: CorrelReq, options?: CallOptions): Promise<JsonArrayStream<object>> {
    const wire = toWireCorrelReq(req);
    return this.openStream(
      'GetCorrelations',
      (client, callOptions) => client.getCorrelations(wire, callOptions),
      serializeCorrel,
      options,
    );
  }

  correlatingTickers(req: CorrelatingTickersReq, options?: CallOptions): Promise<JsonArrayStream<object>> {
    const wire = toWireCorrelTickersReq(req);
    return this.openStream(
      'GetCorrelatingTickers',
      (client, callOptions) => client.getCorrelatingTickers(wire, callOptions),
      serializeCorrel,
      options,
    );
  }

  mutualCorrelations(req: CorrelReq, options?: CallOptions): Promise<MutualCorrel[]> {
    return this.withClient('GetMutualCorrelations', async (client) =>
      fromMutualCorrelMsgs(await client.getMutualCorrelations(toWireCorrelReq(req), options)),
    );
  }

  // ─────────────────────────────────────────────────────────────
  // Stock splits
  // ─────────────────────────────────────────────────────────────

  stockSplits(req: StockSplitsReq, options?: CallOptions): Promise<StockSplit[]> {
    return this.withClient('GetStockSplits', async (client) =>
      (await client.getStockSplits(toWireStockSplitReq(req), options)).map(fromStockSplitMsg),
    );
  }

  // ─────────────────────────────────────────────────────────────
  // Portfolios
  // ─────────────────────────────────────────────────────────────

  portfolio(id: string, options?: CallOptions): Promise<Portfolio> {
    return this.withClient('GetPortfolio', async (client) =>
      fromPortfolioMetaMsg(await client.getPortfolio({ id }, options)),
    );
  }

  portfolios(filter: string, options?: CallOptions): Promise<Portfolio[]> {
    return this.withClient('GetPortfolios', async (client) =>
      (await client.getPortfolios({ filter }, options)).map(fromPortfolioMetaMsg),
    );
  }

  createPortfolio(req: CreatePortfolioReq, options?: CallOptions): Promise<Portfolio> {
    return this.withClient('CreatePortfolio', async (client) =>
      fromPortfolioMetaMsg(await client.createPortfolio(toWireCreatePortfolioReq(req), options)),
    );
  }

  deletePortfolio(id: string, options?: CallOptions): Promise<void> {
    return this.withClient('DeletePortfolio', (client) => client.deletePortfolio({ id }, options));
  }

  portfolioSecurities(id: string, options?: CallOptions): Promise<PortfolioSecurity[]> {
    return this.withClient('GetPortfolioSecurities', async (client) =>
      (await client.getPortfolioSecurities({ id }, options)).map(fromPortfolioSecurityMsg),
    );
  }

  buySecurity(security: PortfolioSecurityReq, options?: CallOptions): Promise<void> {
    return this.withClient('BuySecurity', (client) =>
      client.buySecurity(toWirePortfolioSecurity(security), options),
    );
  }

  sellSecurity(security: PortfolioSecurityReq, options?: CallOptions): Promise<void> {
    return this.withClient('SellSecurity', (client) =>
      client.sellSecurity(toWirePortfolioSecurity(security), options),
    );
  }

  deletePortfolioSecurity(security: PortfolioSecurityReq, options?: CallOptions): Promise<void> {
    return this.withClient('DeletePortfolioSecurity', (client) =>
      client.deletePortfolioSecurity(toWirePortfolioSecurity(security), options),
    );
  }

  portfolioProfits(req: SecurityProfitReq, options?: CallOptions): Promise<SecurityProfit[]> {
    return this.withClient('GetPortfolioProfits', async (client) =>
      (await client.getPortfolioProfits(toWireSecurityProfitReq(req), options)).map(fromSecurityProfitMsg),
    );
  }
}
