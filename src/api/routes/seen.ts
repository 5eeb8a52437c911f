import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { countSeenByEntity, listSeenItems } from '../../discovery/dedupStore.js';
import { entityKey } from '../../discovery/types.js';

export function seenRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/seen: item counts per source entity
  app.get('/seen', (c) => c.json(countSeenByEntity(ctx.db)));

  // GET /api/seen/:kind/:value: most recently seen items of one entity
  app.get('/seen/:kind/:value', (c) => {
    const kind = c.req.param('kind');
    if (kind !== 'handle' && kind !== 'topic') {
      return c.json({ error: 'kind must be handle or topic' }, 400);
    }
    const limit = Number(c.req.query('limit') ?? '100');
    const key = entityKey({ kind, value: c.req.param('value') });
    return c.json({
      source_entity: key,
      items: listSeenItems(ctx.db, key, { limit: Number.isInteger(limit) && limit > 0 ? limit : 100 }),
    });
  });

  return app;
}
