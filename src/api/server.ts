import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import { NewsgatherError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createCollector, type Collector } from '../collect/setup.js';
import { CollectionScheduler } from '../schedule/scheduler.js';
import { collectRoutes } from './routes/collect.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  collector: Collector;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', collectRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof NewsgatherError) {
      return c.json(
        { error: err.message, code: err.code, details: err.details },
        errorCodeToHttpStatus(err.code),
      );
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'SOURCE_ERROR':
      return 502;
    default:
      return 500;
  }
}

export function startServer(config: Config, opts: { port?: number; schedule?: boolean } = {}): void {
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const collector = createCollector(config);
  const app = createApp({ collector });

  const scheduler = opts.schedule ? new CollectionScheduler(collector.orchestrator, config.schedule) : null;

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'newsgather server listening');
  });

  scheduler?.start();

  const shutdown = (): void => {
    logger.info('Shutting down...');
    scheduler?.stop();
    server.close();
    collector.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
