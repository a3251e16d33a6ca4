/**
 * API Server Entry Point
 *
 * Starts the tutoring HTTP API on Node:
 * - Assembles the runtime (database, corpus, orchestrator)
 * - Finds a free port starting from PORT
 * - Prunes expired sessions on an interval
 * - Shuts down cleanly on SIGINT / SIGTERM
 *
 * Usage:
 *   npm run server
 */

import { createServer } from 'node:net';
import { pathToFileURL } from 'node:url';
import { serve } from '@hono/node-server';
import { config, isProduction, validateConfig } from '../config';
import { createTutorRuntime } from '../bootstrap';
import { createApp } from './app';

// ============================================================================
// Port Availability Check
// ============================================================================

/**
 * Resolves to the first port from `preferredPort` up to `maxPort` that can
 * be bound.
 *
 * @throws {Error} If every port in the range is taken
 */
export async function findAvailablePort(preferredPort: number, maxPort: number = preferredPort + 100): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const free = await new Promise<boolean>((resolve) => {
      const probe = createServer();
      probe.once('error', () => resolve(false));
      probe.listen(port, () => probe.close(() => resolve(true)));
    });
    if (free) return port;
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }
  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

// ============================================================================
// Server Startup
// ============================================================================

export async function startServer(): Promise<void> {
  validateConfig();

  const runtime = await createTutorRuntime();
  const app = createApp(runtime, { exposeErrors: !isProduction() });
  const port = await findAvailablePort(config.server.port);

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host }, (info) => {
    console.log('');
    console.log(`[Server] Socratic Scaffold API listening on http://localhost:${info.port}`);
    console.log(`[Server] Environment: ${config.server.nodeEnv}`);
    console.log(`[Server] Health: http://localhost:${info.port}/health`);
    console.log(`[Server] API:    http://localhost:${info.port}/api`);
    console.log('');
  });

  const pruneTimer = setInterval(() => {
    runtime.orchestrator.pruneExpiredSessions().catch((error: unknown) => {
      console.error('[Server] Session pruning failed:', error);
    });
  }, config.session.pruneIntervalMinutes * 60 * 1000);
  pruneTimer.unref();

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    clearInterval(pruneTimer);
    server.close(() => {
      runtime.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  startServer().catch((error: unknown) => {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  });
}
