/**
 * Logger contract shared by services.
 *
 * Fastify's pino logger (`app.log`, `req.log`) satisfies it; tests pass vi.fn() mocks.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export const defaultLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg || ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg || ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg || ''}`, obj),
  debug: (obj, msg) => console.debug(`[DEBUG] ${msg || ''}`, obj),
};
