import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { listCategories, loadCategoryPresets, resolveCategory } from '../../shared/categories.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health
  app.get('/health', (c) => {
    ctx.db.prepare('SELECT 1').get();
    return c.json({
      ok: true,
      collector_configured: ctx.config.collector.base_url !== '',
      scheduled_jobs: ctx.config.schedule.jobs.length,
    });
  });

  // GET /api/categories: preset categories with their hashtags
  app.get('/categories', (c) => {
    const presets = loadCategoryPresets(ctx.config.categories_file || undefined);
    return c.json(
      listCategories(presets).map((name) => ({
        name,
        hashtags: resolveCategory(presets, name).hashtags,
      })),
    );
  });

  return app;
}
