/**
 * Global Error Handler
 *
 * Turns anything a route throws into the standard error envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": { "code": "UPSTREAM_TIMEOUT", "message": "Sorry, ...", "details": { ... } }
 * }
 * ```
 *
 * Engine errors map to fixed statuses. Upstream failures answer 503 with the
 * student-safe apology as the message; cancellations answer 499, the
 * client-closed-request status, though the client has usually gone by then.
 *
 * Hono catches handler errors before they reach an outer middleware, so
 * this is registered with `app.onError` rather than `app.use`.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/api/documents/:id', (c) => {
 *   throw notFoundError('Document', c.req.param('id'));
 * });
 * ```
 */

import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import {
  EmptyDocumentError,
  EmptyMessageError,
  MessageCancelled,
  TutorError,
  UpstreamError,
} from '../../core/errors';
import type { ApiErrorResponse, ValidationErrorDetail } from '../types';

export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Non-standard status for a request the client abandoned */
export const CLIENT_CLOSED_REQUEST = 499;

/**
 * A controlled error raised by a route, with its own status.
 *
 * @example
 * ```typescript
 * throw new AppError('NOT_FOUND', 'Document not found', 404, { id });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(code: ErrorCode | string, message: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

interface FormattedError {
  response: ApiErrorResponse;
  statusCode: number;
}

function envelope(code: string, message: string, details?: unknown): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
}

/**
 * Status for each engine error that reaches the HTTP layer. Anything not
 * listed, such as an invariant violation, is a server fault.
 */
function statusForTutorError(error: TutorError): number {
  if (error instanceof UpstreamError) return 503;
  if (error instanceof EmptyMessageError || error instanceof EmptyDocumentError) return 400;
  if (error instanceof MessageCancelled) return CLIENT_CLOSED_REQUEST;
  return 500;
}

export function toValidationDetails(error: ZodError): ValidationErrorDetail[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Maps a thrown value onto an error envelope and status.
 */
export function formatErrorResponse(error: unknown, isDev: boolean): FormattedError {
  if (error instanceof AppError) {
    return {
      response: envelope(error.code, error.message, error.details),
      statusCode: error.statusCode,
    };
  }

  if (error instanceof UpstreamError) {
    return {
      response: envelope(error.code, error.apology, { operation: error.operation }),
      statusCode: statusForTutorError(error),
    };
  }

  if (error instanceof TutorError) {
    const statusCode = statusForTutorError(error);
    const hideMessage = statusCode >= 500 && !isDev;
    return {
      response: envelope(error.code, hideMessage ? 'An unexpected error occurred. Please try again.' : error.message),
      statusCode,
    };
  }

  if (error instanceof ZodError) {
    return {
      response: envelope(ErrorCodes.VALIDATION_ERROR, 'Invalid request', toValidationDetails(error)),
      statusCode: 400,
    };
  }

  if (error instanceof HTTPException) {
    return {
      response: envelope(error.status >= 500 ? ErrorCodes.INTERNAL_ERROR : ErrorCodes.BAD_REQUEST, error.message),
      statusCode: error.status,
    };
  }

  if (error instanceof Error) {
    return {
      response: envelope(
        ErrorCodes.INTERNAL_ERROR,
        isDev ? error.message : 'An unexpected error occurred. Please try again.',
        isDev ? { stack: error.stack } : undefined
      ),
      statusCode: 500,
    };
  }

  return {
    response: envelope(
      ErrorCodes.INTERNAL_ERROR,
      'An unexpected error occurred',
      isDev ? { rawError: String(error) } : undefined
    ),
    statusCode: 500,
  };
}

/**
 * Creates the application error handler.
 *
 * @param isDev - Include messages and stacks of unexpected errors; defaults
 *   to true outside production
 */
export function errorHandler(isDev: boolean = process.env.NODE_ENV !== 'production'): ErrorHandler {
  return (error: Error, c: Context) => {
    const { response, statusCode } = formatErrorResponse(error, isDev);

    if (statusCode >= 500) {
      console.error(`[Error Handler] ${c.req.method} ${c.req.path}:`, error);
    } else {
      console.warn(`[Error Handler] ${c.req.method} ${c.req.path} -> ${statusCode} ${response.error.code}`);
    }

    // Cast statusCode to ContentfulStatusCode for Hono's type system
    return c.json(response, statusCode as ContentfulStatusCode);
  };
}

export function notFoundError(resource: string, id: string | number): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, `${resource} with ID '${id}' not found`, 404, { resource, id });
}

export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, details);
}
