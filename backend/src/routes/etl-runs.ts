import { Router } from 'express';
import type { Queryable } from '../db.js';
import { notFound } from '../errors.js';
import { getRunStatus } from '../etl/run-log.js';
import { parseId } from '../services/params.js';
import { jsonHandler } from '../utils/json-handler.js';

export function etlRunsRouter(db: Queryable): Router {
  const router = Router();

  router.get(
    '/:runId',
    jsonHandler(async (req) => {
      const runId = parseId('runId', req.params.runId);
      const status = await getRunStatus(db, runId);
      if (!status) {
        throw notFound(`etl run ${runId} not found`);
      }
      return status;
    })
  );

  return router;
}
