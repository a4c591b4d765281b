import { Router } from 'express';
import type { Queryable } from '../db.js';
import { jsonHandler } from '../utils/json-handler.js';

export function healthRouter(db: Queryable): Router {
  const router = Router();
  router.get(
    '/',
    jsonHandler(async () => {
      const { rows } = await db.query<{ now: Date | string }>('select now() as now');
      return { status: 'ok', time: rows[0]?.now ?? null };
    })
  );
  return router;
}
