import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import { env as processEnv, type Env } from './config/env.js';
import { zodValidatorCompiler, formatZodIssues } from './plugins/zod.js';
import { AppError } from './common/errors.js';
import { GrpcConnector, type BackendConnector } from './clients/index.js';
import { TradingService, registerTradingRoutes } from './modules/trading/index.js';

export interface BuildAppOptions {
  /** Overrides the process environment */
  env?: Env;
  /** Backend connector; a GrpcConnector on env.DB_LOADER_HOST:PORT by default */
  connector?: BackendConnector;
  /** `false` silences request logging (tests) */
  logger?: boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const env = options.env ?? processEnv;

  const app = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
    genReqId: () => uuidv4(),
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Request validation
  app.setValidatorCompiler(zodValidatorCompiler);

  // Global error handler
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof AppError) {
      req.log.error({ err, code: err.code }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Request validation (zod plugin)
    if (err instanceof ZodError) {
      req.log.warn({ issues: err.issues }, 'request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: formatZodIssues(err).join('; '),
      });
    }

    // Fastify validation errors (malformed JSON, content type)
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    req.log.error(err);
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : (err.code ?? 'BAD_REQUEST'),
      message: env.NODE_ENV === 'production' && statusCode >= 500 ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    ts: new Date().toISOString(),
  }));

  const connector =
    options.connector ??
    new GrpcConnector({
      host: env.DB_LOADER_HOST,
      port: env.DB_LOADER_PORT,
      protoPath: env.DATALOADER_PROTO_PATH,
      connectTimeoutMs: env.BACKEND_CONNECT_TIMEOUT_MS,
      deadlineMs: env.BACKEND_DEADLINE_MS,
      streamDeadlineMs: env.BACKEND_STREAM_DEADLINE_MS,
      logger: app.log,
    });

  const trading = new TradingService(connector, {
    streamBufferSize: env.STREAM_BUFFER_SIZE,
    stockSplitLookupLimit: env.STOCK_SPLIT_LOOKUP_LIMIT,
    logger: app.log,
  });

  app.register(async (fastify) => {
    await registerTradingRoutes(fastify, { trading });
  });

  return app;
}
