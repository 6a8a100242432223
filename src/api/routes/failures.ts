import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { listFailures } from '../../db/failures.js';

export function failureRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/failures?all=1 — persistence failures awaiting re-drive
  app.get('/failures', (c) => {
    const includeResolved = c.req.query('all') === '1';
    return c.json({ failures: listFailures(ctx.db, { includeResolved }) });
  });

  return app;
}
