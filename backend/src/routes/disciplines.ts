import { Router } from 'express';
import type { CatalogService } from '../services/catalog.js';
import { jsonHandler } from '../utils/json-handler.js';

export function disciplinesRouter(catalog: CatalogService): Router {
  const router = Router();
  router.get(
    '/',
    jsonHandler(() => catalog.listDisciplines())
  );
  return router;
}
