import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as grpc from '@grpc/grpc-js';
import { UpstreamError } from '../../common/errors.js';
import {
  GrpcConnector,
  loadDataLoaderService,
  resolveProtoPath,
  toUpstreamError,
  type DataLoaderClient,
} from '../dataloader.client.js';
import { TickerMsgSchema, type WireTickerFilter } from '../dataloader.wire.js';

function serviceError(code: grpc.status, details: string): grpc.ServiceError {
  return Object.assign(new Error(`${code} ${details}`), { code, details, metadata: new grpc.Metadata() });
}

describe('DataLoader client', () => {
  describe('service contract', () => {
    it('loads the DataLoader service from the proto file', () => {
      const service = loadDataLoaderService(resolveProtoPath());

      expect(service.GetTickers?.path).toBe('/dataloader.DataLoader/GetTickers');
      expect(service.GetTickers?.responseStream).toBe(true);
      expect(service.GetTickerDetails?.responseStream).toBe(false);
      expect(service.GetStockSplits?.requestStream).toBe(false);
    });

    it('prefers an explicit proto path', () => {
      expect(resolveProtoPath('/etc/gateway/dataloader.proto')).toBe('/etc/gateway/dataloader.proto');
    });
  });

  describe('toUpstreamError', () => {
    it('maps a deadline to UPSTREAM_TIMEOUT', () => {
      const err = toUpstreamError('GetMovements', serviceError(grpc.status.DEADLINE_EXCEEDED, 'Deadline exceeded'));

      expect(err.statusCode).toBe(504);
      expect(err.code).toBe('UPSTREAM_TIMEOUT');
      expect(err.message).toBe('GetMovements: DEADLINE_EXCEEDED Deadline exceeded');
    });

    it('maps other statuses to UPSTREAM_ERROR', () => {
      const err = toUpstreamError('GetTickers', serviceError(grpc.status.UNAVAILABLE, 'No connection established'));

      expect(err.statusCode).toBe(502);
      expect(err.code).toBe('UPSTREAM_ERROR');
      expect(err.message).toBe('GetTickers: UNAVAILABLE No connection established');
    });

    it('wraps plain errors and keeps existing UpstreamErrors', () => {
      const existing = new UpstreamError('connect', 'refused');

      expect(toUpstreamError('GetTickers', existing)).toBe(existing);
      expect(toUpstreamError('GetTickers', new Error('boom')).message).toBe('GetTickers: boom');
    });
  });

  describe('GrpcConnector against an in-process server', () => {
    const service = loadDataLoaderService(resolveProtoPath());
    let server: grpc.Server;
    let port = 0;
    let client: DataLoaderClient;

    beforeAll(async () => {
      server = new grpc.Server();
      server.addService(service, {
        GetTickers: (call: grpc.ServerWritableStream<WireTickerFilter, object>) => {
          for (let i = 0; i < call.request.limit; i++) {
            call.write({ name: `Ticker ${i}`, ticker: `T${i}`, security_type: 0, custom_fields: { sector: 'Tech' } });
          }
          call.end();
        },
        GetMovements: (_call: grpc.ServerUnaryCall<object, object>, callback: grpc.sendUnaryData<object>) => {
          callback(null, { movements: [{ ticker: 'AAA', performance: 0.5, period: 3 }] });
        },
        DeletePortfolio: (_call: grpc.ServerUnaryCall<object, object>, callback: grpc.sendUnaryData<object>) => {
          callback({ code: grpc.status.NOT_FOUND, details: 'no such portfolio' });
        },
        BuySecurity: (_call: grpc.ServerUnaryCall<object, object>, callback: grpc.sendUnaryData<object>) => {
          callback(null, {});
        },
      });
      port = await new Promise<number>((resolve, reject) => {
        server.bindAsync('127.0.0.1:0', grpc.ServerCredentials.createInsecure(), (err, boundPort) =>
          err ? reject(err) : resolve(boundPort),
        );
      });
      client = await new GrpcConnector({ host: '127.0.0.1', port }).connect();
    });

    afterAll(() => {
      client.close();
      server.forceShutdown();
    });

    it('streams server messages in order', async () => {
      const items: object[] = [];
      for await (const item of client.getTickers({ ticker_type: 0, filter: '', limit: 3, traded_within_past_n_days: 10 })) {
        items.push(item);
      }

      expect(items).toHaveLength(3);
      expect(TickerMsgSchema.parse(items[0])).toEqual({
        name: 'Ticker 0',
        ticker: 'T0',
        security_type: 0,
        custom_fields: { sector: 'Tech' },
      });
      expect(TickerMsgSchema.parse(items[2]).ticker).toBe('T2');
    });

    it('decodes unary responses with defaults for unset fields', async () => {
      const movements = await client.getMovements({
        security_type: 0,
        until: '2024-01-31',
        period: 3,
        sort_by: 0,
        limit: 10,
        min_volume: 0,
        min_variance: 0,
        max_variance: 0,
      });

      expect(movements).toHaveLength(1);
      expect(movements[0]).toMatchObject({
        ticker: 'AAA',
        name: '',
        performance: 0.5,
        period: 3,
        volume: 0,
        movement_exists: false,
      });
    });

    it('resolves acknowledgement calls', async () => {
      await expect(
        client.buySecurity({
          portfolio_id: 'p-1',
          security_type: 0,
          ticker: 'AAA',
          volume: 5,
          purchase_date: '2024-01-02',
          sell_date: '',
        }),
      ).resolves.toBeUndefined();
    });

    it('rejects backend statuses as UpstreamError', async () => {
      const result = client.deletePortfolio({ id: 'missing' });

      await expect(result).rejects.toBeInstanceOf(UpstreamError);
      await expect(result).rejects.toThrow('DeletePortfolio: NOT_FOUND no such portfolio');
    });

    it('cancels a call whose signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(client.deletePortfolio({ id: 'p-1' }, { signal: controller.signal })).rejects.toThrow(
        'DeletePortfolio: request aborted before the call',
      );
    });

    it('fails to connect to a closed port within the connect timeout', async () => {
      const connector = new GrpcConnector({ host: '127.0.0.1', port: 1, connectTimeoutMs: 200 });

      const result = connector.connect();

      await expect(result).rejects.toBeInstanceOf(UpstreamError);
      await expect(result).rejects.toThrow(/^connect: 127\.0\.0\.1:1 unreachable/);
    });
  });
});
