import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from './app.js';
import { DEFAULT_LIMITS } from './config.js';
import type { Database } from './db.js';
import { runEtl } from './etl/pipeline.js';
import { createTestDatabase } from './testing/database.js';
import { sampleSources } from './testing/fixtures.js';

describe('HTTP API', () => {
  let db: Database;
  let server: Server;
  let baseUrl: string;
  let runId: number;

  beforeAll(async () => {
    db = await createTestDatabase();
    runId = (await runEtl(db, sampleSources(), { matchIterationId: 1503 })).runId;
    const app = createApp({ db, limits: DEFAULT_LIMITS, logRequests: false });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}/api/v1`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await db.close();
  });

  async function get(pathname: string): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}${pathname}`);
    return { status: response.status, body: await response.json() };
  }

  it('reports health', async () => {
    const { status, body } = await get('/health');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
  });

  it('lists disciplines', async () => {
    const { body } = await get('/disciplines');
    expect(body).toEqual([
      { discipline_id: 1, name: 'Family Medicine' },
      { discipline_id: 2, name: 'Internal Medicine' },
      { discipline_id: 3, name: 'Pediatrics' },
    ]);
  });

  it('filters programs from the query string', async () => {
    const { status, body } = await get('/programs?discipline_id=1&q=rural');
    expect(status).toBe(200);
    expect(body).toMatchObject([{ program_stream_id: 27452 }]);
  });

  it('answers 400 naming the invalid parameter', async () => {
    await expect(get('/programs?limit=0')).resolves.toMatchObject({ status: 400, body: { parameter: 'limit' } });
    await expect(get('/programs?q=a&q=b')).resolves.toEqual({
      status: 400,
      body: { message: 'q must be given once', parameter: 'q' },
    });
  });

  it('returns program detail or 404', async () => {
    const found = await get('/programs/27447');
    expect(found.status).toBe(200);
    expect(found.body).toMatchObject({
      program: { program_stream_id: 27447 },
      description: { program_description_id: 9001 },
    });

    await expect(get('/programs/1')).resolves.toEqual({
      status: 404,
      body: { message: 'program stream 1 not found' },
    });
  });

  it('searches section text', async () => {
    const { status, body } = await get('/search?query=interview&limit=1');
    expect(status).toBe(200);
    expect(body).toMatchObject([{ program_stream_id: 27447, section_name: 'interviews' }]);
    await expect(get('/search')).resolves.toMatchObject({ status: 400, body: { parameter: 'query' } });
  });

  it('exposes pipeline run status', async () => {
    await expect(get(`/etl/runs/${runId}`)).resolves.toMatchObject({
      status: 200,
      body: { id: runId, status: 'completed' },
    });
    await expect(get('/etl/runs/999')).resolves.toMatchObject({ status: 404 });
    await expect(get('/etl/runs/abc')).resolves.toMatchObject({ status: 400, body: { parameter: 'runId' } });
  });

  it('serves the OpenAPI document', async () => {
    const { body } = await get('/openapi.json');
    expect(body).toMatchObject({ openapi: expect.stringMatching(/^3\./) });
  });
});
