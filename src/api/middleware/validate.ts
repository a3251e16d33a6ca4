/**
 * Zod Validation Middleware
 *
 * Parses the JSON request body, validates it against a Zod schema, and
 * either hands the parsed value to the route or answers 400 with one
 * detail per failing field. The parsed value is typed through the route's
 * variables, so handlers read it without a cast.
 *
 * @example
 * ```typescript
 * router.post('/:id/messages', validate(sendMessageSchema), async (c) => {
 *   const { text } = c.get('validatedBody');
 *   return success(c, await orchestrator.handleMessage(c.req.param('id'), text));
 * });
 *
 * // POST with body { "text": "" } answers 400:
 * // {
 * //   "success": false,
 * //   "error": {
 * //     "code": "VALIDATION_ERROR",
 * //     "message": "Invalid request body",
 * //     "details": [{ "path": "text", "message": "Message text is required" }]
 * //   }
 * // }
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import type { z } from 'zod';
import type { ApiErrorResponse } from '../types';
import { ErrorCodes, toValidationDetails } from './error-handler';

/**
 * Route variables contributed by `validate(schema)`.
 */
export interface ValidatedBodyEnv<T extends z.ZodTypeAny> {
  Variables: {
    validatedBody: z.output<T>;
  };
}

/**
 * Creates a body validation middleware for `schema`.
 */
export function validate<T extends z.ZodTypeAny>(schema: T): MiddlewareHandler<ValidatedBodyEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      // Malformed JSON surfaces as a SyntaxError from the body parser
      if (!(err instanceof SyntaxError)) throw err;
      const response: ApiErrorResponse = {
        success: false,
        error: {
          code: ErrorCodes.INVALID_JSON,
          message: 'Request body must be valid JSON',
        },
      };
      return c.json(response, 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const response: ApiErrorResponse = {
        success: false,
        error: {
          code: ErrorCodes.VALIDATION_ERROR,
          message: 'Invalid request body',
          details: toValidationDetails(result.error),
        },
      };
      return c.json(response, 400);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}
