import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { HarvestError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { HealthRegistry } from '../pipeline/health.js';
import type { RetentionSweeper } from '../retention/sweeper.js';
import type { Runtime } from '../pipeline/runtime.js';
import { Scheduler } from '../pipeline/scheduler.js';
import { systemRoutes } from './routes/system.js';
import { runRoutes } from './routes/runs.js';
import { failureRoutes } from './routes/failures.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  health: HealthRegistry;
  sweeper: Pick<RetentionSweeper, 'sweep' | 'state'>;
  startedAt: Date;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  // Middleware
  app.use('*', cors());

  // Mount route groups
  app.route('/api', systemRoutes(ctx));
  app.route('/api', runRoutes(ctx));
  app.route('/api', failureRoutes(ctx));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof HarvestError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'RETENTION_ERROR':
      return 409;
    case 'SOURCE_FETCH_ERROR':
    case 'FETCH_ERROR':
    case 'INDEX_ERROR':
    case 'LLM_ERROR':
      return 502;
    case 'TIMEOUT':
      return 504;
    default:
      return 500;
  }
}

/**
 * Serve the status surface and run cycles on the configured schedule until SIGINT or
 * SIGTERM.
 */
export function startServer(runtime: Runtime, opts: { port?: number; runOnStart?: boolean } = {}): void {
  const { config } = runtime;
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const app = createApp({
    db: runtime.db,
    config,
    health: runtime.health,
    sweeper: runtime.sweeper,
    startedAt: runtime.startedAt,
  });

  const scheduler = new Scheduler(runtime.orchestrator, {
    cycleCron: config.schedule.cycle_cron,
    runOnStart: opts.runOnStart ?? true,
  });

  logger.info({ port, host }, 'Starting newsharvest server');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Status server listening');
  });

  scheduler.start();

  // Handle graceful shutdown
  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');
    server.close();
    scheduler
      .stop()
      .then(() => runtime.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
