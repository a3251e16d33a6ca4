/**
 * API Middleware - Barrel Export
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.use('*', loggerMiddleware());
 * app.post('/api/documents', validate(ingestDocumentSchema), handler);
 * ```
 */

export {
  errorHandler,
  formatErrorResponse,
  toValidationDetails,
  AppError,
  ErrorCodes,
  CLIENT_CLOSED_REQUEST,
  notFoundError,
  validationError,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, formatResponseTime, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

export { validate, type ValidatedBodyEnv } from './validate';
