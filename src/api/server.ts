import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { loadConfig } from '../shared/config.js';
import { ScoutError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import type { CollaboratorFactory } from '../engine/runner.js';
import { runRoutes } from './routes/runs.js';
import { seenRoutes } from './routes/seen.js';
import { systemRoutes } from './routes/system.js';
import { startScheduler, stopScheduler } from '../schedule/scheduler.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  /** Overrides the HTTP collaborators, mainly for tests. */
  collaborators?: CollaboratorFactory;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', systemRoutes(ctx));
  app.route('/api', runRoutes(ctx));
  app.route('/api', seenRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof ScoutError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
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
    case 'PARSE_ERROR':
      return 400;
    case 'COLLECTION_ERROR':
    case 'DETAIL_FETCH_ERROR':
    case 'HTTP_ERROR':
      return 502;
    default:
      return 500;
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);

  const app = createApp({ db, config });
  startScheduler(db, config);

  logger.info({ port, host }, 'Starting gridscout server');
  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Server listening');
  });

  const shutdown = (): void => {
    logger.info('Shutting down');
    stopScheduler();
    server.close(() => {
      closeDb();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
