/**
 * zod request validation for Fastify routes.
 *
 * Route schemas (`schema: { body, querystring }`) are zod types. A failed parse
 * surfaces as the ZodError itself, which Fastify tags with statusCode 400 and
 * FST_ERR_VALIDATION before it reaches the global error handler. A successful
 * parse replaces the raw input with the parsed value (defaults applied).
 */

import type { FastifySchemaCompiler } from 'fastify';
import type { ZodError, ZodTypeAny } from 'zod';

export const zodValidatorCompiler: FastifySchemaCompiler<ZodTypeAny> =
  ({ schema }) =>
  (data) => {
    const result = schema.safeParse(data);
    if (result.success) {
      return { value: result.data };
    }
    return { error: result.error };
  };

/**
 * Flatten zod issues into "path: message" strings for error bodies.
 */
export function formatZodIssues(err: ZodError): string[] {
  return err.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
