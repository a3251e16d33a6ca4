/**
 * Health Check Route
 *
 * Liveness endpoint for load balancers and uptime checks. It reports how
 * many chunks the in-process corpus holds, which is zero until the first
 * document is ingested; the tutor still answers then, but only with the
 * no-material reply.
 *
 * @example
 * ```bash
 * curl http://localhost:3001/health
 * # { "success": true, "data": { "status": "ok", "indexedChunks": 42, ... } }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  /** 'degraded' while the corpus is empty */
  status: 'ok' | 'degraded';
  timestamp: string;
  environment: string;
  version: string;
  indexedChunks: number;
}

export const APP_VERSION = '0.1.0';

export interface HealthDependencies {
  corpus: { readonly size: number };
}

export function healthRoutes(deps: HealthDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const indexedChunks = deps.corpus.size;
    const healthData: HealthCheckData = {
      status: indexedChunks > 0 ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
      indexedChunks,
    };

    return success(c, healthData);
  });

  return router;
}
