/**
 * HTTP Application
 *
 * Builds the Hono app for a tutoring runtime. Kept apart from the server
 * entry point so tests can drive it with `app.request()` without binding
 * a port.
 *
 * Middleware order:
 * 1. Error handler (`onError`) turns thrown errors into envelopes
 * 2. Request logger
 * 3. Routes: `/health` and everything under `/api`
 * 4. Not-found handler for unmatched paths
 *
 * @example
 * ```typescript
 * const runtime = await createTutorRuntime();
 * const app = createApp(runtime);
 * const res = await app.request('/api/sessions/s1/messages', {
 *   method: 'POST',
 *   headers: { 'Content-Type': 'application/json' },
 *   body: JSON.stringify({ text: 'Why do cells need mitochondria?' }),
 * });
 * ```
 */

import { Hono } from 'hono';
import { errorHandler, loggerMiddleware, ErrorCodes, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes, type ApiRouterDependencies, type HealthDependencies } from './routes';
import { error } from './utils/response';

export type AppDependencies = ApiRouterDependencies & HealthDependencies;

export interface AppOptions {
  logger?: Partial<LoggerConfig>;
  /** Include internal error messages in 500 responses */
  exposeErrors?: boolean;
}

export function createApp(deps: AppDependencies, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler(options.exposeErrors));
  app.use('*', loggerMiddleware(options.logger));

  app.route('/health', healthRoutes(deps));
  app.route('/api', createApiRouter(deps));

  app.notFound((c) => error(c, ErrorCodes.NOT_FOUND, `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}
