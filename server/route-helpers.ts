/**
 * Shared pieces for the read-only analysis routers: query validation,
 * not-found responses and error-to-status mapping.
 */

import type { Response } from 'express';
import { z } from 'zod';
import { isStorageUnavailable } from './analysis-store';

/**
 * Decimal integer parameter. Only plain digits are accepted, so `0x10`,
 * `1e2` and padded values are rejected instead of being coerced.
 */
export function integerParam(min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return z
    .string()
    .regex(/^\d+$/, 'Expected a non-negative decimal integer')
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));
}

/** Optional `?analysis_id=` selecting a specific run instead of the latest. */
export const AnalysisIdQuerySchema = z.object({
  analysis_id: integerParam(1).optional(),
});

export const RunIdParamSchema = integerParam(1);

export function formatZodError(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || 'value'}: ${e.message}`).join('; ');
}

export function sendInvalidParams(res: Response, error: z.ZodError): Response {
  return res.status(400).json({
    error: 'Invalid query parameters',
    message: formatZodError(error),
  });
}

export function sendNotFound(res: Response, message: string): Response {
  return res.status(404).json({ error: 'Not found', message });
}

/**
 * Map an unexpected failure to 503 (storage unreachable) or 500.
 */
export function sendRouteError(res: Response, err: unknown, context: string): Response {
  if (isStorageUnavailable(err)) {
    console.warn(
      `[${context}] Storage unavailable:`,
      err instanceof Error ? err.message : String(err)
    );
    return res.status(503).json({
      error: 'Service unavailable',
      message: 'Analysis storage is not reachable. Try again later.',
    });
  }

  console.error(`[${context}] Unexpected error:`, err);
  return res.status(500).json({
    error: 'internal_error',
    message: 'Internal server error',
  });
}
