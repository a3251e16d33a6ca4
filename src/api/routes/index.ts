/**
 * API Routes Index
 *
 * Mounts every route module under `/api`:
 * - `/api` - API discovery
 * - `/api/sessions` - Tutoring conversations
 * - `/api/documents` - Source material
 *
 * The health check is mounted by the server at `/health`, outside `/api`.
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import { documentRoutes, type DocumentRouteDependencies } from './documents';
import { sessionRoutes, type SessionRouteDependencies } from './sessions';

export { healthRoutes, APP_VERSION, type HealthCheckData, type HealthDependencies } from './health';
export { sessionRoutes, type SessionRouteDependencies, type TranscriptTurn } from './sessions';
export { documentRoutes, type DocumentRouteDependencies } from './documents';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    method: string;
    path: string;
    description: string;
  }[];
}

export type ApiRouterDependencies = SessionRouteDependencies & DocumentRouteDependencies;

const API_VERSION = '0.1.0';

// ============================================================================
// API Router Factory
// ============================================================================

export function createApiRouter(deps: ApiRouterDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Socratic Scaffold API',
      version: API_VERSION,
      endpoints: [
        { method: 'POST', path: '/api/sessions/:id/messages', description: 'Send a student message' },
        { method: 'POST', path: '/api/sessions/:id/reset', description: 'Start the conversation over' },
        { method: 'GET', path: '/api/sessions/:id/state', description: 'Current thread and scaffold level' },
        { method: 'GET', path: '/api/sessions/:id/transcript', description: 'Retained conversation turns' },
        { method: 'POST', path: '/api/documents', description: 'Ingest source material' },
        { method: 'GET', path: '/api/documents', description: 'List ingested documents' },
        { method: 'GET', path: '/health', description: 'Health check' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/sessions', sessionRoutes(deps));
  router.route('/documents', documentRoutes(deps));

  return router;
}
