/**
 * API Module - Barrel Export
 *
 * The HTTP surface of the tutor: app factory, middleware, routes, request
 * schemas and response helpers.
 */

export { createApp, type AppDependencies, type AppOptions } from './app';
export { findAvailablePort, startServer } from './server';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  CLIENT_CLOSED_REQUEST,
  notFoundError,
  validationError,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  validate,
  type ErrorCode,
  type LoggerConfig,
  type ValidatedBodyEnv,
} from './middleware';

export {
  createApiRouter,
  healthRoutes,
  sessionRoutes,
  documentRoutes,
  type ApiRouterDependencies,
  type ApiInfo,
  type TranscriptTurn,
} from './routes';

export {
  sendMessageSchema,
  ingestDocumentSchema,
  sessionIdSchema,
  MAX_MESSAGE_LENGTH,
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
  type SendMessageInput,
  type IngestDocumentInput,
} from './types';

export { success, error } from './utils/response';
