import { z } from 'zod';

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    DATABASE_URL: z.preprocess(
      (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
      z.string().trim().optional()
    ),
    POSTGRES_HOST: z.string().default('localhost'),
    POSTGRES_PORT: intFromEnv(5432),
    POSTGRES_USER: z.string().default('residency'),
    POSTGRES_PASSWORD: z.string().default('residency'),
    POSTGRES_DB: z.string().default('residency'),
    API_PORT: intFromEnv(8080),
    RAW_DATA_DIR: z.string().default('data/raw'),
    MATCH_ITERATION_ID: intFromEnv(1503),
    QUERY_DEFAULT_LIMIT: intFromEnv(20),
    QUERY_MAX_LIMIT: intFromEnv(100),
  })
  .refine((env) => env.QUERY_DEFAULT_LIMIT <= env.QUERY_MAX_LIMIT, {
    message: 'QUERY_DEFAULT_LIMIT must not exceed QUERY_MAX_LIMIT',
    path: ['QUERY_DEFAULT_LIMIT'],
  });

export type DatabaseConfig =
  | { kind: 'pglite'; dataDir: string | null }
  | { kind: 'postgres'; connectionString: string }
  | { kind: 'postgres'; host: string; port: number; user: string; password: string; database: string };

export type QueryLimits = {
  defaultLimit: number;
  maxLimit: number;
};

export type AppConfig = {
  database: DatabaseConfig;
  apiPort: number;
  rawDataDir: string;
  matchIterationId: number;
  limits: QueryLimits;
};

function databaseConfig(env: z.infer<typeof envSchema>): DatabaseConfig {
  const url = env.DATABASE_URL;
  if (url?.startsWith('pglite:')) {
    const dataDir = url.slice('pglite:'.length);
    return { kind: 'pglite', dataDir: dataDir.length ? dataDir : null };
  }
  if (url) {
    return { kind: 'postgres', connectionString: url };
  }
  return {
    kind: 'postgres',
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    database: env.POSTGRES_DB,
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  return Object.freeze({
    database: databaseConfig(env),
    apiPort: env.API_PORT,
    rawDataDir: env.RAW_DATA_DIR,
    matchIterationId: env.MATCH_ITERATION_ID,
    limits: {
      defaultLimit: env.QUERY_DEFAULT_LIMIT,
      maxLimit: env.QUERY_MAX_LIMIT,
    },
  });
}

export const DEFAULT_LIMITS: QueryLimits = { defaultLimit: 20, maxLimit: 100 };
