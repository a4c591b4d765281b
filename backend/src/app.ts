import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import type { QueryLimits } from './config.js';
import type { Database } from './db.js';
import { errorHandler } from './middleware/error-handler.js';
import { disciplinesRouter } from './routes/disciplines.js';
import { etlRunsRouter } from './routes/etl-runs.js';
import { healthRouter } from './routes/health.js';
import { programsRouter } from './routes/programs.js';
import { searchRouter } from './routes/search.js';
import { CatalogService } from './services/catalog.js';
import { SearchService } from './services/search.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

export type AppOptions = {
  db: Database;
  limits: QueryLimits;
  /** Access logging; off in tests. */
  logRequests?: boolean;
};

export function createApp({ db, limits, logRequests = true }: AppOptions): Express {
  const openApiDocument = z.record(z.string(), z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));
  const catalog = new CatalogService(db, limits);
  const search = new SearchService(db, limits);

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (logRequests) {
    app.use(morgan('combined'));
  }

  app.use('/api/v1/health', healthRouter(db));

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/api/v1/disciplines', disciplinesRouter(catalog));
  app.use('/api/v1/programs', programsRouter(catalog));
  app.use('/api/v1/search', searchRouter(search));
  app.use('/api/v1/etl/runs', etlRunsRouter(db));

  app.use(errorHandler);
  return app;
}
