/**
 * TRADING ROUTES
 * ==============
 *
 * REST surface of the DataLoader gateway.
 *
 * ENDPOINTS:
 *   POST /tickers                     - streamed Ticker[]
 *   POST /ticker                      - Ticker details
 *   POST /securityData                - streamed TimeSeriesData[]
 *   POST /securityData/latestDate     - latest stored date
 *   POST /movement, /avgMovement      - single Movement
 *   POST /movements, /avgMovements    - Movement[] (stock-split filter)
 *   POST /correlations                - streamed CorrelatingTickers[] for given tickers
 *   POST /correlatingTickers          - streamed CorrelatingTickers[]
 *   POST /mutualCorrelations          - MutualCorrel[]
 *   POST /stockSplits                 - StockSplit[]
 *   GET  /portfolio?id=               - Portfolio
 *   GET  /portfolios?filter=          - Portfolio[]
 *   POST /portfolio/create            - Portfolio
 *   POST /portfolio/delete            - { success, error }
 *   POST /portfolio/buy, /sell        - { success, error }
 *   POST /portfolio/security/delete   - { success, error }
 *   GET  /portfolio/securities?id=    - PortfolioSecurity[]
 *   POST /portfolio/profits           - SecurityProfit[]
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../../common/errors.js';
import type { JsonArrayStream } from '../../../core/streaming/json-array.stream.js';
import {
  BasicTickerSchema,
  CorrelReqSchema,
  CorrelatingTickersReqSchema,
  CreatePortfolioSchema,
  LatestDateReqSchema,
  MovementReqSchema,
  MovementsReqSchema,
  PortfolioFilterSchema,
  PortfolioIdSchema,
  PortfolioSecuritySchema,
  SecurityProfitReqSchema,
  StockSplitsReqSchema,
  TickerFilterSchema,
  TimeSeriesReqSchema,
  type BasicTicker,
  type CorrelReq,
  type CorrelatingTickersReq,
  type CreatePortfolioReq,
  type LatestDateReq,
  type MovementReq,
  type MovementsReq,
  type PortfolioSecurityReq,
  type SecurityProfitReq,
  type StockSplitsReq,
  type SuccessResponse,
  type TickerFilter,
  type TimeSeriesReq,
} from '../contracts/trading.types.js';
import type { TradingService } from '../services/trading.service.js';

export interface TradingRoutesDeps {
  trading: TradingService;
}

type PortfolioId = z.infer<typeof PortfolioIdSchema>;
type PortfolioFilter = z.infer<typeof PortfolioFilterSchema>;

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

/**
 * Aborts when the client goes away before the response is written.
 */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function sendJsonArray(reply: FastifyReply, stream: JsonArrayStream<object>): FastifyReply {
  return reply.type('application/json; charset=utf-8').send(stream);
}

/**
 * Success/failure endpoints answer `{ success, error }` on both paths.
 */
async function acknowledge(
  req: FastifyRequest,
  reply: FastifyReply,
  action: () => Promise<void>,
): Promise<FastifyReply> {
  try {
    await action();
    const body: SuccessResponse = { success: true, error: null };
    return reply.send(body);
  } catch (err) {
    if (!(err instanceof AppError)) {
      throw err;
    }
    req.log.error({ err, code: err.code }, 'portfolio operation failed');
    const body: SuccessResponse = { success: false, error: err.message };
    return reply.status(err.statusCode).send(body);
  }
}

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerTradingRoutes(app: FastifyInstance, deps: TradingRoutesDeps): Promise<void> {
  const { trading } = deps;

  // ─────────────────────────────────────────────────────────────
  // TICKERS
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /tickers - Tickers matching a filter, streamed
   * Defaults: limit 100, traded_within_past_n_days 10
   */
  app.post<{ Body: TickerFilter }>('/tickers', { schema: { body: TickerFilterSchema } }, async (req, reply) => {
    const stream = await trading.tickers(req.body, { signal: disconnectSignal(reply) });
    return sendJsonArray(reply, stream);
  });

  /**
   * POST /ticker - Ticker details by identity
   */
  app.post<{ Body: BasicTicker }>('/ticker', { schema: { body: BasicTickerSchema } }, async (req, reply) => {
    return trading.tickerDetails(req.body, { signal: disconnectSignal(reply) });
  });

  // ─────────────────────────────────────────────────────────────
  // SECURITY DATA
  // ─────────────────────────────────────────────────────────────

  app.post<{ Body: TimeSeriesReq }>(
    '/securityData',
    { schema: { body: TimeSeriesReqSchema } },
    async (req, reply) => {
      const stream = await trading.securityData(req.body, { signal: disconnectSignal(reply) });
      return sendJsonArray(reply, stream);
    },
  );

  app.post<{ Body: LatestDateReq }>(
    '/securityData/latestDate',
    { schema: { body: LatestDateReqSchema } },
    async (req, reply) => {
      return trading.latestSecurityDataDate(req.body, { signal: disconnectSignal(reply) });
    },
  );

  // ─────────────────────────────────────────────────────────────
  // MOVEMENTS
  // ─────────────────────────────────────────────────────────────

  app.post<{ Body: MovementReq }>('/movement', { schema: { body: MovementReqSchema } }, async (req, reply) => {
    return trading.movement(req.body, { signal: disconnectSignal(reply) });
  });

  app.post<{ Body: MovementReq }>('/avgMovement', { schema: { body: MovementReqSchema } }, async (req, reply) => {
    return trading.avgMovement(req.body, { signal: disconnectSignal(reply) });
  });

  /**
   * POST /movements - Materialized, not streamed: the stock-split filter
   * needs the full list before anything is written.
   */
  app.post<{ Body: MovementsReq }>('/movements', { schema: { body: MovementsReqSchema } }, async (req, reply) => {
    return trading.movements(req.body, { signal: disconnectSignal(reply) });
  });

  app.post<{ Body: MovementsReq }>('/avgMovements', { schema: { body: MovementsReqSchema } }, async (req, reply) => {
    return trading.avgMovements(req.body, { signal: disconnectSignal(reply) });
  });

  // ─────────────────────────────────────────────────────────────
  // CORRELATIONS
  // ─────────────────────────────────────────────────────────────

  app.post<{ Body: CorrelReq }>('/correlations', { schema: { body: CorrelReqSchema } }, async (req, reply) => {
    const stream = await trading.correlations(req.body, { signal: disconnectSignal(reply) });
    return sendJsonArray(reply, stream);
  });

  app.post<{ Body: CorrelatingTickersReq }>(
    '/correlatingTickers',
    { schema: { body: CorrelatingTickersReqSchema } },
    async (req, reply) => {
      const stream = await trading.correlatingTickers(req.body, { signal: disconnectSignal(reply) });
      return sendJsonArray(reply, stream);
    },
  );

  /**
   * POST /mutualCorrelations - All-or-nothing: one correlation without
   * ticker identities fails the request with TRANSLATION_ERROR
   */
  app.post<{ Body: CorrelReq }>(
    '/mutualCorrelations',
    { schema: { body: CorrelReqSchema } },
    async (req, reply) => {
      return trading.mutualCorrelations(req.body, { signal: disconnectSignal(reply) });
    },
  );

  app.post<{ Body: StockSplitsReq }>('/stockSplits', { schema: { body: StockSplitsReqSchema } }, async (req, reply) => {
    return trading.stockSplits(req.body, { signal: disconnectSignal(reply) });
  });

  // ─────────────────────────────────────────────────────────────
  // PORTFOLIOS
  // ─────────────────────────────────────────────────────────────

  app.get<{ Querystring: PortfolioId }>(
    '/portfolio',
    { schema: { querystring: PortfolioIdSchema } },
    async (req, reply) => {
      return trading.portfolio(req.query.id, { signal: disconnectSignal(reply) });
    },
  );

  app.get<{ Querystring: PortfolioFilter }>(
    '/portfolios',
    { schema: { querystring: PortfolioFilterSchema } },
    async (req, reply) => {
      return trading.portfolios(req.query.filter ?? '', { signal: disconnectSignal(reply) });
    },
  );

  app.post<{ Body: CreatePortfolioReq }>(
    '/portfolio/create',
    { schema: { body: CreatePortfolioSchema } },
    async (req, reply) => {
      return trading.createPortfolio(req.body, { signal: disconnectSignal(reply) });
    },
  );

  app.post<{ Body: PortfolioId }>('/portfolio/delete', { schema: { body: PortfolioIdSchema } }, async (req, reply) => {
    return acknowledge(req, reply, () => trading.deletePortfolio(req.body.id, { signal: disconnectSignal(reply) }));
  });

  app.post<{ Body: PortfolioSecurityReq }>(
    '/portfolio/buy',
    { schema: { body: PortfolioSecuritySchema } },
    async (req, reply) => {
      return acknowledge(req, reply, () => trading.buySecurity(req.body, { signal: disconnectSignal(reply) }));
    },
  );

  app.post<{ Body: PortfolioSecurityReq }>(
    '/portfolio/sell',
    { schema: { body: PortfolioSecuritySchema } },
    async (req, reply) => {
      return acknowledge(req, reply, () => trading.sellSecurity(req.body, { signal: disconnectSignal(reply) }));
    },
  );

  app.post<{ Body: PortfolioSecurityReq }>(
    '/portfolio/security/delete',
    { schema: { body: PortfolioSecuritySchema } },
    async (req, reply) => {
      return acknowledge(req, reply, () =>
        trading.deletePortfolioSecurity(req.body, { signal: disconnectSignal(reply) }),
      );
    },
  );

  app.get<{ Querystring: PortfolioId }>(
    '/portfolio/securities',
    { schema: { querystring: PortfolioIdSchema } },
    async (req, reply) => {
      return trading.portfolioSecurities(req.query.id, { signal: disconnectSignal(reply) });
    },
  );

  app.post<{ Body: SecurityProfitReq }>(
    '/portfolio/profits',
    { schema: { body: SecurityProfitReqSchema } },
    async (req, reply) => {
      return trading.portfolioProfits(req.body, { signal: disconnectSignal(reply) });
    },
  );

  app.log.info('[Trading] Routes registered');
}
