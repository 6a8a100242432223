import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health — collaborator health and uptime
  app.get('/health', async (c) => {
    const components = await ctx.health.check();
    const degraded = components.some((comp) => comp.status === 'unhealthy');
    return c.json({
      status: degraded ? 'degraded' : 'ok',
      version: '0.1.0',
      uptime: Math.round((Date.now() - ctx.startedAt.getTime()) / 1000),
      retention: ctx.sweeper.state,
      components,
    });
  });

  return app;
}
