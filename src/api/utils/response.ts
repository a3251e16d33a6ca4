/**
 * Response Helpers
 *
 * Shorthands that wrap route results in the API envelope.
 *
 * @example
 * ```typescript
 * router.get('/', (c) => success(c, documents.findAllWithChunkCounts()));
 * router.post('/', async (c) => success(c, await ingestor.ingest(body), 201));
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

export function success<T>(c: Context, data: T, statusCode: number = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  // Cast statusCode to ContentfulStatusCode for Hono's type system
  return c.json(response, statusCode as ContentfulStatusCode);
}

export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: number = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };

  // Cast statusCode to ContentfulStatusCode for Hono's type system
  return c.json(response, statusCode as ContentfulStatusCode);
}
