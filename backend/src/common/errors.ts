/**
 * Application error taxonomy
 *
 * Every error that reaches the global Fastify error handler is mapped to a
 * status code and a stable `error` code. Callers must be able to tell
 * "backend is broken" (UPSTREAM_*) from "backend returned a shape we refuse
 * to trust" (TRANSLATION_ERROR).
 */

// ═══════════════════════════════════════════════════════════════
// BASE
// ═══════════════════════════════════════════════════════════════

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(statusCode: number, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

// ═══════════════════════════════════════════════════════════════
// KINDS
// ═══════════════════════════════════════════════════════════════

/**
 * Backend unreachable, RPC-level failure or an undecodable backend message.
 * Never retried in this layer.
 */
export class UpstreamError extends AppError {
  public readonly rpc: string;

  constructor(rpc: string, message: string, options?: { cause?: unknown; timeout?: boolean }) {
    super(
      options?.timeout ? 504 : 502,
      options?.timeout ? 'UPSTREAM_TIMEOUT' : 'UPSTREAM_ERROR',
      `${rpc}: ${message}`,
      { cause: options?.cause },
    );
    this.name = 'UpstreamError';
    this.rpc = rpc;
  }
}

/**
 * A translation invariant was violated by a backend response
 * (e.g. a correlation entry without a ticker identity).
 */
export class TranslationError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(502, 'TRANSLATION_ERROR', `Translation failed: ${field} - ${message}`);
    this.name = 'TranslationError';
    this.field = field;
  }
}

/**
 * The REST request cannot be translated into a backend message.
 */
export class RequestValidationError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(400, 'VALIDATION_ERROR', `${field}: ${message}`);
    this.name = 'RequestValidationError';
    this.field = field;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
