import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { parseQuery } from '../../source/adapter.js';

const CollectBody = z.object({
  query: z.string().optional(),
  max_count: z.number().int().positive().optional(),
  use_api: z.boolean().optional(),
  use_crawl: z.boolean().optional(),
  category: z.string().optional(),
});

const CollectManyBody = z.object({
  queries: z.array(z.string()).min(1),
  per_query_max: z.number().int().positive().optional(),
  use_api: z.boolean().optional(),
  use_crawl: z.boolean().optional(),
});

export function collectRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const { orchestrator, config } = ctx.collector;

  // POST /api/collect: one orchestration run, 200 with the outcome even on failure
  app.post('/collect', async (c) => {
    const parsed = CollectBody.safeParse(await c.req.json<unknown>().catch(() => ({})));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', errors: parsed.error.flatten().fieldErrors }, 400);
    }
    const body = parsed.data;

    const outcome = await orchestrator.collect(
      parseQuery(body.query),
      body.max_count ?? config.collect.default_max_count,
      { useApi: body.use_api, useCrawl: body.use_crawl, category: body.category },
    );
    return c.json(outcome);
  });

  // POST /api/collect/many: queries in order, one outcome each
  app.post('/collect/many', async (c) => {
    const parsed = CollectManyBody.safeParse(await c.req.json<unknown>().catch(() => ({})));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', errors: parsed.error.flatten().fieldErrors }, 400);
    }
    const body = parsed.data;

    const outcomes = await orchestrator.collectMany(
      body.queries.map((q) => parseQuery(q)),
      body.per_query_max ?? config.collect.default_max_count,
      { useApi: body.use_api, useCrawl: body.use_crawl },
    );
    return c.json(outcomes);
  });

  return app;
}
