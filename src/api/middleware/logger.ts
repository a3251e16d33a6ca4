/**
 * Request Logger Middleware
 *
 * One line per request, written after the response is ready:
 *
 * ```
 * [API] POST /api/sessions/s1/messages 200 - 1.84s
 * [API] POST /api/documents 400 - 3ms
 * ```
 *
 * Tutoring turns call the model several times, so times over a second
 * are shown in seconds.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ skipPaths: ['/health'] }));
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  /** Color the status code for terminal output */
  colorize: boolean;
  /** Where lines go */
  write: (line: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function statusColor(status: number): string {
  if (status >= 500) return '\x1b[31m';
  if (status >= 400) return '\x1b[33m';
  if (status >= 300) return '\x1b[36m';
  return '\x1b[32m';
}

export function formatResponseTime(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const { prefix, skipPaths, colorize, write } = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const elapsed = formatResponseTime(Math.round(performance.now() - startTime));

    const status = c.res.status;
    const line = colorize
      ? `${prefix} ${c.req.method} ${path} ${statusColor(status)}${status}${RESET} - ${DIM}${elapsed}${RESET}`
      : `${prefix} ${c.req.method} ${path} ${status} - ${elapsed}`;

    write(line);
  };
}
