import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Database } from '../db.js';
import { ConflictingReferenceError, LoadError, UnjoinedSectionError } from '../errors.js';
import { createTestDatabase } from '../testing/database.js';
import { masterRow, sampleSources, URL_HARBOUR, URL_LAKESIDE, URL_RURAL } from '../testing/fixtures.js';
import { StreamIdentityResolver } from './identity.js';
import { countTables, loadBatch, loadKnownIdentities } from './loader.js';
import { normalize } from './normalizer.js';
import { runEtl } from './pipeline.js';
import { getRunStatus } from './run-log.js';
import { TABLES } from './types.js';

const options = { matchIterationId: 1503 };

async function snapshot(db: Database) {
  const streams = await db.query('select * from program_streams order by program_stream_id');
  const descriptions = await db.query('select * from program_descriptions order by program_description_id');
  const sections = await db.query('select * from program_description_sections order by id');
  return { streams: streams.rows, descriptions: descriptions.rows, sections: sections.rows };
}

async function sectionId(db: Database, programDescriptionId: number, sectionName: string): Promise<number | undefined> {
  const { rows } = await db.query<{ id: number }>(
    'select id from program_description_sections where program_description_id = $1 and section_name = $2',
    [programDescriptionId, sectionName]
  );
  return rows[0]?.id;
}

describe('runEtl', () => {
  let db: Database;

  beforeEach(async () => {
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.close();
  });

  it('loads the five tables and reconciles them against the prepared rows', async () => {
    const result = await runEtl(db, sampleSources(), options);

    expect(result.status).toBe('completed');
    expect(result.counts).toEqual({
      disciplines: 3,
      schools: 2,
      program_streams: 4,
      program_descriptions: 3,
      program_description_sections: 6,
    });
    expect(result.changes.program_streams).toEqual({ inserted: 4, updated: 0, deleted: 0 });
    expect(result.changes.program_description_sections).toEqual({ inserted: 6, updated: 0, deleted: 0 });
    for (const table of TABLES) {
      expect(result.reconciliation[table].stored).toBe(result.reconciliation[table].prepared);
    }
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(UnjoinedSectionError);
    await expect(countTables(db)).resolves.toEqual(result.counts);
  });

  it('leaves no orphaned rows behind', async () => {
    await runEtl(db, sampleSources(), options);

    const { rows } = await db.query<{ orphans: number }>(`
      select
        (select count(*) from program_streams p
          where not exists (select 1 from disciplines d where d.discipline_id = p.discipline_id)
             or not exists (select 1 from schools s where s.school_id = p.school_id))::int
        + (select count(*) from program_descriptions d
          where not exists (select 1 from program_streams p where p.program_stream_id = d.program_stream_id))::int
        + (select count(*) from program_description_sections sec
          where not exists (
            select 1 from program_descriptions d where d.program_description_id = sec.program_description_id
          ))::int as orphans
    `);
    expect(rows[0]?.orphans).toBe(0);
  });

  it('changes nothing when run twice on the same input', async () => {
    await runEtl(db, sampleSources(), options);
    const before = await snapshot(db);

    const second = await runEtl(db, sampleSources(), options);

    for (const table of TABLES) {
      expect(second.changes[table]).toEqual({ inserted: 0, updated: 0, deleted: 0 });
    }
    expect(await snapshot(db)).toEqual(before);
  });

  it('updates changed section text in place', async () => {
    await runEtl(db, sampleSources(), options);
    const id = await sectionId(db, 9001, 'interviews');

    const sources = sampleSources();
    sources.xSection[0] = { ...sources.xSection[0], interviews: 'Interviews are held in person.' };
    const result = await runEtl(db, sources, options);

    expect(result.changes.program_description_sections).toEqual({ inserted: 0, updated: 1, deleted: 0 });
    expect(result.changes.program_descriptions).toEqual({ inserted: 0, updated: 0, deleted: 0 });
    expect(await sectionId(db, 9001, 'interviews')).toBe(id);
    const { rows } = await db.query<{ section_text: string }>(
      `select section_text from program_description_sections where id = $1`,
      [id]
    );
    expect(rows[0]?.section_text).toBe('Interviews are held in person.');
  });

  it('removes streams that disappeared from the extract', async () => {
    await runEtl(db, sampleSources(), options);

    const sources = sampleSources();
    sources.programMaster = sources.programMaster.filter((row) => row.program_url !== URL_RURAL);
    sources.xSection = sources.xSection.filter((row) => row.source !== URL_RURAL);
    const result = await runEtl(db, sources, options);

    expect(result.changes.program_streams).toEqual({ inserted: 0, updated: 0, deleted: 1 });
    expect(result.changes.program_descriptions).toEqual({ inserted: 0, updated: 0, deleted: 1 });
    expect(result.changes.program_description_sections).toEqual({ inserted: 0, updated: 0, deleted: 1 });
    await expect(countTables(db)).resolves.toEqual({
      disciplines: 3,
      schools: 2,
      program_streams: 3,
      program_descriptions: 2,
      program_description_sections: 5,
    });
  });

  it('counts sections dropped with a description that moved to another stream', async () => {
    await runEtl(db, sampleSources(), options);

    const sources = sampleSources();
    sources.xSection[1] = { ...sources.xSection[1], source: URL_RURAL };
    sources.xSection[2] = { ...sources.xSection[2], source: URL_HARBOUR };
    const result = await runEtl(db, sources, options);

    expect(result.changes.program_descriptions).toEqual({ inserted: 2, updated: 0, deleted: 2 });
    expect(result.changes.program_description_sections).toEqual({ inserted: 3, updated: 0, deleted: 3 });
    const { rows } = await db.query<{ program_stream_id: number }>(
      'select program_stream_id from program_descriptions where program_description_id = 9002'
    );
    expect(rows).toEqual([{ program_stream_id: 27452 }]);
  });

  it('reports an unmatched row even when its description id is not a number', async () => {
    const sources = sampleSources();
    sources.xSection[3] = { ...sources.xSection[3], program_description_id: 'n/a' };
    const result = await runEtl(db, sources, options);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(UnjoinedSectionError);
    expect(result.errors[0]?.details).toMatchObject({ program_description_id: null, row: 4 });
  });

  it('keeps a stream id once assigned, even if the source id changes', async () => {
    await runEtl(db, sampleSources(), options);

    const sources = sampleSources();
    sources.programMaster[0] = masterRow({ program_stream_id: '5' });
    const result = await runEtl(db, sources, options);

    expect(result.changes.program_streams).toEqual({ inserted: 0, updated: 0, deleted: 0 });
    const { rows } = await db.query<{ program_stream_id: number }>(
      'select program_stream_id from program_streams where program_url = $1',
      [URL_LAKESIDE]
    );
    expect(rows).toEqual([{ program_stream_id: 27447 }]);
  });

  it('keeps the previous load and records a failed run on a fatal data error', async () => {
    const first = await runEtl(db, sampleSources(), options);
    const before = await snapshot(db);

    const sources = sampleSources();
    sources.programMaster.push(
      masterRow({ program_url: 'https://programs.example.test/1503/1', school_name: 'Northfield Univ.' })
    );
    await expect(runEtl(db, sources, options)).rejects.toBeInstanceOf(ConflictingReferenceError);

    expect(await snapshot(db)).toEqual(before);
    const status = await getRunStatus(db, first.runId + 1);
    expect(status?.status).toBe('failed');
    expect(status?.error).toBe('school 10 maps to conflicting values: "Northfield Univ." vs "Northfield University"');
    expect(status?.logs.map((log) => log.level)).toEqual(['info', 'error']);
    expect(status?.logs[0]?.message).toBe('Read discipline=3 program_master=5 x_section=4');
  });

  it('records the summary of a completed run', async () => {
    const result = await runEtl(db, sampleSources(), options);
    const status = await getRunStatus(db, result.runId);

    expect(status?.status).toBe('completed');
    expect(status?.finishedAt).not.toBeNull();
    expect(status?.summary).toMatchObject({ runId: result.runId, counts: result.counts });
    expect(status?.logs.at(-1)?.message).toBe('Load committed');
  });

  it('runs concurrent requests one after another', async () => {
    const [first, second] = await Promise.all([
      runEtl(db, sampleSources(), options),
      runEtl(db, sampleSources(), options),
    ]);

    expect(second.runId).toBe(first.runId + 1);
    expect(first.changes.program_streams.inserted).toBe(4);
    expect(second.changes.program_streams).toEqual({ inserted: 0, updated: 0, deleted: 0 });
  });

  it('returns null for an unknown run', async () => {
    await expect(getRunStatus(db, 404)).resolves.toBeNull();
  });
});

describe('loadBatch', () => {
  let db: Database;

  beforeEach(async () => {
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.close();
  });

  it('refuses a batch that gives a stored stream id to another url', async () => {
    await runEtl(db, sampleSources(), options);
    const urlC = 'https://programs.example.test/1503/30001';
    const urlD = 'https://programs.example.test/1503/30002';

    // Resolved before the run that adds urlC commits.
    const staleSources = sampleSources();
    staleSources.programMaster.push(masterRow({ program_url: urlD, program_stream_id: null }));
    const resolver = new StreamIdentityResolver(await loadKnownIdentities(db));
    const { batch: staleBatch } = normalize(staleSources, { ...options, resolver });
    expect(staleBatch.programStreams.find((stream) => stream.program_url === urlD)?.program_stream_id).toBe(27461);

    const sources = sampleSources();
    sources.programMaster.push(masterRow({ program_url: urlC, program_stream_id: null }));
    await runEtl(db, sources, options);
    const before = await snapshot(db);

    const failure = loadBatch(db, staleBatch);
    await expect(failure).rejects.toBeInstanceOf(ConflictingReferenceError);
    await expect(failure).rejects.toMatchObject({
      details: { entity: 'program_stream_id', key: 27461, values: [urlC, urlD] },
    });
    expect(await snapshot(db)).toEqual(before);
  });

  it('refuses a batch that moves a stored url to another id', async () => {
    await runEtl(db, sampleSources(), options);
    const { batch } = normalize(sampleSources(), options);
    batch.programStreams = batch.programStreams.map((stream) =>
      stream.program_url === URL_LAKESIDE ? { ...stream, program_stream_id: 5 } : stream
    );
    batch.programDescriptions = batch.programDescriptions.map((description) =>
      description.source_url === URL_LAKESIDE ? { ...description, program_stream_id: 5 } : description
    );

    await expect(loadBatch(db, batch)).rejects.toMatchObject({
      details: { entity: 'program_url', key: URL_LAKESIDE, values: [27447, 5] },
    });
    const { rows } = await db.query<{ program_stream_id: number }>(
      'select program_stream_id from program_streams where program_url = $1',
      [URL_LAKESIDE]
    );
    expect(rows).toEqual([{ program_stream_id: 27447 }]);
  });

  it('rolls back everything when a table fails to load', async () => {
    const { batch } = normalize(sampleSources(), options);
    const [firstStream, ...otherStreams] = batch.programStreams;
    if (!firstStream) throw new Error('fixture has no streams');
    batch.programStreams = [{ ...firstStream, discipline_id: 99 }, ...otherStreams];

    const failure = loadBatch(db, batch);
    await expect(failure).rejects.toBeInstanceOf(LoadError);
    await expect(failure).rejects.toMatchObject({ details: { table: 'program_streams' } });
    await expect(countTables(db)).resolves.toEqual({
      disciplines: 0,
      schools: 0,
      program_streams: 0,
      program_descriptions: 0,
      program_description_sections: 0,
    });
  });
});
