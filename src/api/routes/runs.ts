import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { getLatestCycleRun, getLatestRetentionRun, listCycleRuns } from '../../db/runs.js';

const SweepRequestSchema = z.object({
  hours: z.number().positive().optional(),
  include_archive: z.boolean().optional(),
});

export function runRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/cycles?limit=20
  app.get('/cycles', (c) => {
    const limit = Math.min(Math.max(Number(c.req.query('limit') ?? 20) || 20, 1), 200);
    return c.json({ cycles: listCycleRuns(ctx.db, limit) });
  });

  // GET /api/cycles/latest
  app.get('/cycles/latest', (c) => {
    const latest = getLatestCycleRun(ctx.db);
    if (!latest) return c.json({ error: 'No cycles recorded yet' }, 404);
    return c.json(latest);
  });

  // GET /api/retention/latest
  app.get('/retention/latest', (c) => {
    const latest = getLatestRetentionRun(ctx.db);
    if (!latest) return c.json({ error: 'No retention runs recorded yet' }, 404);
    return c.json(latest);
  });

  // POST /api/retention — manual sweep
  app.post('/retention', async (c) => {
    const body = await c.req.json<unknown>().catch(() => ({}));
    const parsed = SweepRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', errors: parsed.error.flatten().fieldErrors }, 400);
    }

    const result = await ctx.sweeper.sweep(parsed.data.hours ?? ctx.config.retention.hours, {
      includeArchive: parsed.data.include_archive ?? ctx.config.retention.include_archive,
    });
    const status = result.status === 'rejected' ? 409 : result.status === 'failed' ? 500 : 200;
    return c.json(result, status);
  });

  return app;
}
