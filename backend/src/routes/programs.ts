import { Router } from 'express';
import type { CatalogService } from '../services/catalog.js';
import { jsonHandler } from '../utils/json-handler.js';
import { queryValue } from './query-value.js';

export function programsRouter(catalog: CatalogService): Router {
  const router = Router();

  router.get(
    '/',
    jsonHandler((req) =>
      catalog.listPrograms({
        discipline_id: queryValue(req.query.discipline_id, 'discipline_id'),
        school_id: queryValue(req.query.school_id, 'school_id'),
        q: queryValue(req.query.q, 'q'),
        limit: queryValue(req.query.limit, 'limit'),
        offset: queryValue(req.query.offset, 'offset'),
      })
    )
  );

  router.get(
    '/:programStreamId',
    jsonHandler((req) => catalog.getProgram(req.params.programStreamId))
  );

  return router;
}
