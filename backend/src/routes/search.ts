import { Router } from 'express';
import type { SearchService } from '../services/search.js';
import { jsonHandler } from '../utils/json-handler.js';
import { queryValue } from './query-value.js';

export function searchRouter(search: SearchService): Router {
  const router = Router();

  router.get(
    '/',
    jsonHandler((req) =>
      search.search({
        query: queryValue(req.query.query, 'query'),
        limit: queryValue(req.query.limit, 'limit'),
        offset: queryValue(req.query.offset, 'offset'),
      })
    )
  );

  return router;
}
