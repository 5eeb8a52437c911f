import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { runProfile, runTrends, type CompletedRun } from '../../engine/runner.js';
import { getRun, listRuns } from '../../engine/output.js';

const ProfileBodySchema = z.object({
  handle: z.string().min(1),
  posts: z.number().int().positive().optional(),
  exhaustive: z.boolean().optional(),
  dry_run: z.boolean().optional(),
});

const TrendsBodySchema = z.object({
  category: z.string().min(1),
  max_reels: z.number().int().positive().optional(),
  max_hours: z.number().positive().optional(),
  dry_run: z.boolean().optional(),
});

function toResponse(run: CompletedRun): Record<string, unknown> {
  return {
    run_id: run.runId,
    output_path: run.outputPath,
    stats: run.report.stats,
    unresolved: run.report.unresolved,
    result: run.report.result,
  };
}

export function runRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/runs/profile: newest posts of a handle
  app.post('/runs/profile', async (c) => {
    const body = ProfileBodySchema.safeParse(await c.req.json<unknown>().catch(() => ({})));
    if (!body.success) {
      return c.json({ error: 'Invalid request', details: body.error.flatten().fieldErrors }, 400);
    }

    const run = await runProfile(ctx.db, ctx.config, {
      handle: body.data.handle,
      posts: body.data.posts,
      exhaustive: body.data.exhaustive,
      dryRun: body.data.dry_run,
      collaborators: ctx.collaborators,
    });
    return c.json(toResponse(run), 201);
  });

  // POST /api/runs/trends: most engaging recent items of a category
  app.post('/runs/trends', async (c) => {
    const body = TrendsBodySchema.safeParse(await c.req.json<unknown>().catch(() => ({})));
    if (!body.success) {
      return c.json({ error: 'Invalid request', details: body.error.flatten().fieldErrors }, 400);
    }

    const run = await runTrends(ctx.db, ctx.config, {
      category: body.data.category,
      maxReels: body.data.max_reels,
      maxHours: body.data.max_hours,
      dryRun: body.data.dry_run,
      collaborators: ctx.collaborators,
    });
    return c.json(toResponse(run), 201);
  });

  // GET /api/runs?entity=handle:foo&limit=20
  app.get('/runs', (c) => {
    const limit = Number(c.req.query('limit') ?? '20');
    return c.json(
      listRuns(ctx.db, {
        sourceEntity: c.req.query('entity'),
        limit: Number.isInteger(limit) && limit > 0 ? limit : 20,
      }),
    );
  });

  // GET /api/runs/:id
  app.get('/runs/:id', (c) => {
    const run = getRun(ctx.db, c.req.param('id'));
    if (!run) {
      return c.json({ error: 'Run not found' }, 404);
    }
    return c.json(run);
  });

  return app;
}
