import { PGlite, type Transaction } from '@electric-sql/pglite';
import { Pool, type PoolClient } from 'pg';
import type { DatabaseConfig } from './config.js';

export type Row = Record<string, unknown>;

/**
 * Anything that runs a parameterised statement: a pool, a client inside a
 * transaction, or an embedded PGlite instance.
 */
export interface Queryable {
  query<T extends Row = Row>(text: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

export interface Database extends Queryable {
  /** Runs `fn` inside `begin`/`commit`; any throw rolls the whole unit back. */
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

function clientQueryable(client: PoolClient): Queryable {
  return {
    async query<T extends Row = Row>(text: string, params?: unknown[]) {
      const result = await client.query<T>(text, params);
      return { rows: result.rows };
    },
  };
}

function pgliteQueryable(tx: Transaction): Queryable {
  return {
    async query<T extends Row = Row>(text: string, params?: unknown[]) {
      const result = await tx.query<T>(text, params);
      return { rows: result.rows };
    },
  };
}

export class PgDatabase implements Database {
  constructor(private readonly pool: Pool) {}

  async query<T extends Row = Row>(text: string, params?: unknown[]): Promise<{ rows: T[] }> {
    const result = await this.pool.query<T>(text, params);
    return { rows: result.rows };
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
      const result = await fn(clientQueryable(client));
      await client.query('commit');
      return result;
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export class PgliteDatabase implements Database {
  constructor(private readonly db: PGlite) {}

  async query<T extends Row = Row>(text: string, params?: unknown[]): Promise<{ rows: T[] }> {
    const result = await this.db.query<T>(text, params);
    return { rows: result.rows };
  }

  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(pgliteQueryable(tx)));
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}

/**
 * `pglite` configs open an embedded database (in memory when no directory is
 * given); anything else goes through a node-postgres pool.
 */
export function createDatabase(config: DatabaseConfig): Database {
  if (config.kind === 'pglite') {
    return new PgliteDatabase(config.dataDir ? new PGlite(config.dataDir) : new PGlite());
  }
  if ('connectionString' in config) {
    return new PgDatabase(new Pool({ connectionString: config.connectionString }));
  }
  return new PgDatabase(
    new Pool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
    })
  );
}
