import { Hono } from 'hono';
import type { AppContext } from '../server.js';

function limitParam(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? Math.min(n, 500) : fallback;
}

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const { orchestrator, store } = ctx.collector;

  app.get('/health', (c) => {
    return c.json({ status: 'ok', uptime: process.uptime(), db: store.ping() ? 'ok' : 'error' });
  });

  // GET /api/validate: source reachability and store connectivity, no collection
  app.get('/validate', async (c) => {
    const ok = await orchestrator.validateSetup();
    return c.json({ ok }, ok ? 200 : 503);
  });

  app.get('/stats', (c) => c.json(orchestrator.getStatistics()));

  app.get('/articles/recent', (c) => {
    return c.json(store.getRecentArticles(limitParam(c.req.query('limit'), 20)));
  });

  app.get('/articles/:id', (c) => {
    const id = Number(c.req.param('id'));
    const article = Number.isInteger(id) ? store.getArticle(id) : undefined;
    if (!article) return c.json({ error: 'Article not found' }, 404);
    return c.json(article);
  });

  app.get('/logs', (c) => {
    return c.json(store.listRecentLogs(limitParam(c.req.query('limit'), 20)));
  });

  return app;
}
