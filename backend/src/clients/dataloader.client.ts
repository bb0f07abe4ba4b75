/**
 * DataLoader gRPC Client
 *
 * ═══════════════════════════════════════════════════════════════
 * CONNECTION MODEL
 * ═══════════════════════════════════════════════════════════════
 *
 * The facade never holds a backend connection between operations. It asks a
 * BackendConnector for a fresh DataLoaderClient, uses it for one logical call
 * and closes it. A pooled or multiplexed connector can replace GrpcConnector
 * without touching the facade.
 *
 * The service definition is loaded from `backend/proto/dataloader.proto` at
 * run time with @grpc/proto-loader; calls go through the generic
 * grpc.Client request methods.
 *
 * @example
 * const connector = new GrpcConnector({ host: 'localhost', port: 8002 });
 * const client = await connector.connect();
 * try {
 *   const portfolio = await client.getPortfolio({ id: 'p-1' });
 * } finally {
 *   client.close();
 * }
 */

import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import type { MethodDefinition, ServiceDefinition } from '@grpc/proto-loader';
import type { ZodTypeAny, output } from 'zod';
import { UpstreamError, errorMessage } from '../common/errors.js';
import type { Logger } from '../common/logger.js';
import {
  DateMsgSchema,
  MovementMsgSchema,
  MovementsMsgSchema,
  MutualCorrelsMsgSchema,
  PortfolioMetaMsgSchema,
  PortfolioMetasMsgSchema,
  PortfolioSecuritiesMsgSchema,
  SecurityProfitsMsgSchema,
  StockSplitsMsgSchema,
  SuccessRespMsgSchema,
  TickerMsgSchema,
  type MovementMsg,
  type MutualCorrelMsg,
  type PortfolioMetaMsg,
  type PortfolioSecurityMsg,
  type SecurityProfitMsg,
  type StockSplitMsg,
  type TickerMsg,
  type WireBasicTicker,
  type WireCorrelReq,
  type WireCorrelTickersReq,
  type WireCreatePortfolioReq,
  type WireDateReq,
  type WireId,
  type WireMovementReq,
  type WireMovementsReq,
  type WirePortfolioReq,
  type WirePortfolioSecurity,
  type WireSecurityProfitReq,
  type WireStockSplitReq,
  type WireTickerFilter,
  type WireTimeSeriesReq,
} from './dataloader.wire.js';

// ============================================
// TYPES
// ============================================

/**
 * Undecoded messages of a server-streaming RPC, in backend order.
 * Calling `return()` cancels the underlying call.
 */
export type BackendStream = AsyncGenerator<object, void, undefined>;

export interface CallOptions {
  /** Aborting cancels the in-flight RPC */
  signal?: AbortSignal;
}

export interface DataLoaderClient {
  getTickerDetails(req: WireBasicTicker, options?: CallOptions): Promise<TickerMsg>;
  getTickers(req: WireTickerFilter, options?: CallOptions): BackendStream;

  getSecurityData(req: WireTimeSeriesReq, options?: CallOptions): BackendStream;
  getLatestSecurityDataDate(req: WireDateReq, options?: CallOptions): Promise<string>;

  getMovement(req: WireMovementReq, options?: CallOptions): Promise<MovementMsg>;
  getMovements(req: WireMovementsReq, options?: CallOptions): Promise<MovementMsg[]>;
  getAvgMovement(req: WireMovementReq, options?: CallOptions): Promise<MovementMsg>;
  getAvgMovements(req: WireMovementsReq, options?: CallOptions): Promise<MovementMsg[]>;

  getCorrelations(req: WireCorrelReq, options?: CallOptions): BackendStream;
  getCorrelatingTickers(req: WireCorrelTickersReq, options?: CallOptions): BackendStream;
  getMutualCorrelations(req: WireCorrelReq, options?: CallOptions): Promise<MutualCorrelMsg[]>;

  getPortfolios(req: WirePortfolioReq, options?: CallOptions): Promise<PortfolioMetaMsg[]>;
  getPortfolio(req: WireId, options?: CallOptions): Promise<PortfolioMetaMsg>;
  getPortfolioSecurities(req: WireId, options?: CallOptions): Promise<PortfolioSecurityMsg[]>;
  getPortfolioProfits(req: WireSecurityProfitReq, options?: CallOptions): Promise<SecurityProfitMsg[]>;

  createPortfolio(req: WireCreatePortfolioReq, options?: CallOptions): Promise<PortfolioMetaMsg>;
  deletePortfolio(req: WireId, options?: CallOptions): Promise<void>;
  buySecurity(req: WirePortfolioSecurity, options?: CallOptions): Promise<void>;
  sellSecurity(req: WirePortfolioSecurity, options?: CallOptions): Promise<void>;
  deletePortfolioSecurity(req: WirePortfolioSecurity, options?: CallOptions): Promise<void>;

  getStockSplits(req: WireStockSplitReq, options?: CallOptions): Promise<StockSplitMsg[]>;

  close(): void;
}

export interface BackendConnector {
  connect(): Promise<DataLoaderClient>;
}

// ============================================
// CLIENT CONFIGURATION
// ============================================

export interface GrpcConnectorConfig {
  host: string;
  port: number;
  protoPath?: string;
  connectTimeoutMs: number;
  deadlineMs: number;
  streamDeadlineMs: number;
  logger?: Logger;
}

const DEFAULT_CONFIG: Omit<GrpcConnectorConfig, 'host' | 'port'> = {
  connectTimeoutMs: 5_000,
  deadlineMs: 30_000,
  streamDeadlineMs: 300_000,
};

const SERVICE_NAME = 'dataloader.DataLoader';

// sources: backend/src/clients -> backend/proto; build: dist/backend/src/clients -> backend/proto
const PROTO_CANDIDATES = ['../../proto/dataloader.proto', '../../../../backend/proto/dataloader.proto'];

export function resolveProtoPath(override?: string): string {
  if (override) {
    return override;
  }
  for (const candidate of PROTO_CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(path)) {
      return path;
    }
  }
  throw new Error('[DataLoader] dataloader.proto not found; set DATALOADER_PROTO_PATH');
}

export function loadDataLoaderService(protoPath: string): ServiceDefinition {
  const packageDefinition = protoLoader.loadSync(protoPath, {
    keepCase: true,
    longs: Number,
    defaults: true,
    oneofs: true,
  });
  const definition = packageDefinition[SERVICE_NAME];
  if (!definition || 'format' in definition) {
    throw new Error(`[DataLoader] ${SERVICE_NAME} is not a service in ${protoPath}`);
  }
  return definition;
}

function isServiceError(err: unknown): err is grpc.ServiceError {
  return err instanceof Error && 'code' in err && 'details' in err;
}

export function toUpstreamError(rpc: string, err: unknown): UpstreamError {
  if (err instanceof UpstreamError) {
    return err;
  }
  if (isServiceError(err)) {
    return new UpstreamError(rpc, `${grpc.status[err.code] ?? err.code} ${err.details}`, {
      cause: err,
      timeout: err.code === grpc.status.DEADLINE_EXCEEDED,
    });
  }
  return new UpstreamError(rpc, errorMessage(err), { cause: err });
}

function decode<S extends ZodTypeAny>(rpc: string, schema: S, value: unknown): output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UpstreamError(rpc, `undecodable response: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

// ============================================
// GRPC DATALOADER CLIENT
// ============================================

export class GrpcDataLoaderClient implements DataLoaderClient {
  constructor(
    private readonly client: grpc.Client,
    private readonly service: ServiceDefinition,
    private readonly config: Pick<GrpcConnectorConfig, 'deadlineMs' | 'streamDeadlineMs' | 'logger'>,
  ) {}

  private method(rpc: string): MethodDefinition<object, object> {
    const method = this.service[rpc];
    if (!method) {
      throw new UpstreamError(rpc, 'rpc not defined in the service contract');
    }
    return method;
  }

  private unary<S extends ZodTypeAny>(
    rpc: string,
    request: object,
    schema: S,
    options?: CallOptions,
  ): Promise<output<S>> {
    return new Promise((resolve, reject) => {
      const signal = options?.signal;
      if (signal?.aborted) {
        reject(new UpstreamError(rpc, 'request aborted before the call'));
        return;
      }
      const method = this.method(rpc);
      const onAbort = (): void => call.cancel();
      const call = this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        new grpc.Metadata(),
        { deadline: Date.now() + this.config.deadlineMs },
        (err, value) => {
          signal?.removeEventListener('abort', onAbort);
          if (err) {
            reject(toUpstreamError(rpc, err));
            return;
          }
          try {
            resolve(decode(rpc, schema, value));
          } catch (decodeErr) {
            reject(decodeErr);
          }
        },
      );
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private async *serverStream(rpc: string, request: object, options?: CallOptions): BackendStream {
    const method = this.method(rpc);
    const call = this.client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      request,
      new grpc.Metadata(),
      { deadline: Date.now() + this.config.streamDeadlineMs },
    );
    // The iterator rethrows stream errors; this listener keeps late statuses
    // (e.g. CANCELLED after an early return) from becoming unhandled events.
    call.on('error', (err: Error) => {
      this.config.logger?.debug?.({ rpc, err: err.message }, 'stream status');
    });

    const signal = options?.signal;
    const onAbort = (): void => call.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });

    let completed = false;
    try {
      for await (const message of call) {
        const item: object = message;
        yield item;
      }
      completed = true;
    } catch (err) {
      throw toUpstreamError(rpc, err);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!completed) {
        call.cancel();
      }
    }
  }

  private async ack(rpc: string, request: object, options?: CallOptions): Promise<void> {
    await this.unary(rpc, request, SuccessRespMsgSchema, options);
  }

  // ============================================
  // TICKERS
  // ============================================

  getTickerDetails(req: WireBasicTicker, options?: CallOptions): Promise<TickerMsg> {
    return this.unary('GetTickerDetails', req, TickerMsgSchema, options);
  }

  getTickers(req: WireTickerFilter, options?: CallOptions): BackendStream {
    return this.serverStream('GetTickers', req, options);
  }

  // ============================================
  // TIME SERIES
  // ============================================

  getSecurityData(req: WireTimeSeriesReq, options?: CallOptions): BackendStream {
    return this.serverStream('GetSecurityData', req, options);
  }

  async getLatestSecurityDataDate(req: WireDateReq, options?: CallOptions): Promise<string> {
    const { date } = await this.unary('GetLatestSecurityDataDate', req, DateMsgSchema, options);
    return date;
  }

  // ============================================
  // MOVEMENTS
  // ============================================

  getMovement(req: WireMovementReq, options?: CallOptions): Promise<MovementMsg> {
    return this.unary('GetMovement', req, MovementMsgSchema, options);
  }

  async getMovements(req: WireMovementsReq, options?: CallOptions): Promise<MovementMsg[]> {
    const { movements } = await this.unary('GetMovements', req, MovementsMsgSchema, options);
    return movements;
  }

  getAvgMovement(req: WireMovementReq, options?: CallOptions): Promise<MovementMsg> {
    return this.unary('GetAvgMovement', req, MovementMsgSchema, options);
  }

  async getAvgMovements(req: WireMovementsReq, options?: CallOptions): Promise<MovementMsg[]> {
    const { movements } = await this.unary('GetAvgMovements', req, MovementsMsgSchema, options);
    return movements;
  }

  // ============================================
  // CORRELATIONS
  // ============================================

  getCorrelations(req: WireCorrelReq, options?: CallOptions): BackendStream {
    return this.serverStream('GetCorrelations', req, options);
  }

  getCorrelatingTickers(req: WireCorrelTickersReq, options?: CallOptions): BackendStream {
    return this.serverStream('GetCorrelatingTickers', req, options);
  }

  async getMutualCorrelations(req: WireCorrelReq, options?: CallOptions): Promise<MutualCorrelMsg[]> {
    const { correls } = await this.unary('GetMutualCorrelations', req, MutualCorrelsMsgSchema, options);
    return correls;
  }

  // ============================================
  // PORTFOLIOS
  // ============================================

  async getPortfolios(req: WirePortfolioReq, options?: CallOptions): Promise<PortfolioMetaMsg[]> {
    const { portfolios } = await this.unary('GetPortfolios', req, PortfolioMetasMsgSchema, options);
    return portfolios;
  }

  getPortfolio(req: WireId, options?: CallOptions): Promise<PortfolioMetaMsg> {
    return this.unary('GetPortfolio', req, PortfolioMetaMsgSchema, options);
  }

  async getPortfolioSecurities(req: WireId, options?: CallOptions): Promise<PortfolioSecurityMsg[]> {
    const { securities } = await this.unary('GetPortfolioSecurities', req, PortfolioSecuritiesMsgSchema, options);
    return securities;
  }

  async getPortfolioProfits(req: WireSecurityProfitReq, options?: CallOptions): Promise<SecurityProfitMsg[]> {
    const { profits } = await this.unary('GetPortfolioProfits', req, SecurityProfitsMsgSchema, options);
    return profits;
  }

  createPortfolio(req: WireCreatePortfolioReq, options?: CallOptions): Promise<PortfolioMetaMsg> {
    return this.unary('CreatePortfolio', req, PortfolioMetaMsgSchema, options);
  }

  deletePortfolio(req: WireId, options?: CallOptions): Promise<void> {
    return this.ack('DeletePortfolio', req, options);
  }

  buySecurity(req: WirePortfolioSecurity, options?: CallOptions): Promise<void> {
    return this.ack('BuySecurity', req, options);
  }

  sellSecurity(req: WirePortfolioSecurity, options?: CallOptions): Promise<void> {
    return this.ack('SellSecurity', req, options);
  }

  deletePortfolioSecurity(req: WirePortfolioSecurity, options?: CallOptions): Promise<void> {
    return this.ack('DeletePortfolioSecurity', req, options);
  }

  // ============================================
  // STOCK SPLITS
  // ============================================

  async getStockSplits(req: WireStockSplitReq, options?: CallOptions): Promise<StockSplitMsg[]> {
    const { splits } = await this.unary('GetStockSplits', req, StockSplitsMsgSchema, options);
    return splits;
  }

  close(): void {
    this.client.close();
  }
}

// ============================================
// CONNECTOR
// ============================================

/**
 * Opens one insecure gRPC channel per connect() call.
 */
export class GrpcConnector implements BackendConnector {
  private readonly config: GrpcConnectorConfig;
  private readonly service: ServiceDefinition;

  constructor(config: Partial<GrpcConnectorConfig> & Pick<GrpcConnectorConfig, 'host' | 'port'>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.service = loadDataLoaderService(resolveProtoPath(config.protoPath));
  }

  get address(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  async connect(): Promise<DataLoaderClient> {
    const client = new grpc.Client(this.address, grpc.credentials.createInsecure());
    try {
      await new Promise<void>((resolve, reject) => {
        client.waitForReady(Date.now() + this.config.connectTimeoutMs, (err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      client.close();
      throw new UpstreamError('connect', `${this.address} unreachable: ${errorMessage(err)}`, { cause: err });
    }
    return new GrpcDataLoaderClient(client, this.service, this.config);
  }
}
