/**
 * Gateway entry point
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = (signal: string): void => {
    console.log(`[BOOT] ${signal} received, closing listener`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[BOOT] Failed to close cleanly:', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ host: env.HOST, port: env.PORT });
  console.log(`[BOOT] Gateway listening on ${env.HOST}:${env.PORT}, DataLoader at ${env.DB_LOADER_HOST}:${env.DB_LOADER_PORT}`);
}

process.on('unhandledRejection', (reason) => {
  console.error('[BOOT] Unhandled rejection:', reason);
});

main().catch((err: unknown) => {
  console.error('[BOOT] Failed to start:', err);
  process.exit(1);
});
