/**
 * Process configuration
 *
 * Read once at start-up and never mutated afterwards.
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const port = z.coerce.number().int().min(1).max(65535);
const millis = z.coerce.number().int().positive();

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // HTTP listener
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: port.default(8080),
  CORS_ORIGINS: z.string().default('*'),

  // Log verbosity; MODE is the legacy name
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  MODE: z.enum(LOG_LEVELS).default('info'),

  // DataLoader backend
  DB_LOADER_HOST: z.string().min(1).default('[::]'),
  DB_LOADER_PORT: port.default(8002),
  DATALOADER_PROTO_PATH: z.string().optional(),
  BACKEND_CONNECT_TIMEOUT_MS: millis.default(5_000),
  BACKEND_DEADLINE_MS: millis.default(30_000),
  BACKEND_STREAM_DEADLINE_MS: millis.default(300_000),

  // Streaming bridge buffer, in JSON fragments
  STREAM_BUFFER_SIZE: z.coerce.number().int().min(1).default(100),

  STOCK_SPLIT_LOOKUP_LIMIT: z.coerce.number().int().positive().default(10_000),
});

export type EnvInput = z.input<typeof EnvSchema>;

export type Env = Omit<z.output<typeof EnvSchema>, 'LOG_LEVEL' | 'MODE'> & {
  LOG_LEVEL: (typeof LOG_LEVELS)[number];
};

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  const { LOG_LEVEL, MODE, ...rest } = result.data;
  return { ...rest, LOG_LEVEL: LOG_LEVEL ?? MODE };
}

export const env: Env = parseEnv(process.env);
