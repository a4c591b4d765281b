import type { Database, Queryable, Row } from '../db.js';
import { ConflictingReferenceError, EtlError, LoadError } from '../errors.js';
import {
  batchCounts,
  type DisciplineRecord,
  type NormalizedBatch,
  type ProgramDescriptionRecord,
  type ProgramDescriptionSectionRecord,
  type ProgramStreamRecord,
  type SchoolRecord,
  type TableChanges,
  type TableCounts,
  type TableName,
} from './types.js';

export type LoadSummary = {
  counts: TableCounts;
  changes: Record<TableName, TableChanges>;
};

// Shared by every process loading into the same database.
const LOAD_LOCK_KEY = 7150301;

const STAGE_BATCH_SIZE = 500;

type StagingTable<T extends Row> = {
  name: string;
  columns: ReadonlyArray<{ name: keyof T & string; type: string }>;
};

const DISCIPLINES_STAGE: StagingTable<DisciplineRecord> = {
  name: 'stg_disciplines',
  columns: [
    { name: 'discipline_id', type: 'integer' },
    { name: 'name', type: 'text' },
  ],
};

const SCHOOLS_STAGE: StagingTable<SchoolRecord> = {
  name: 'stg_schools',
  columns: [
    { name: 'school_id', type: 'integer' },
    { name: 'name', type: 'text' },
  ],
};

const PROGRAM_STREAMS_STAGE: StagingTable<ProgramStreamRecord> = {
  name: 'stg_program_streams',
  columns: [
    { name: 'program_stream_id', type: 'integer' },
    { name: 'discipline_id', type: 'integer' },
    { name: 'school_id', type: 'integer' },
    { name: 'stream_name', type: 'text' },
    { name: 'site', type: 'text' },
    { name: 'stream_label', type: 'text' },
    { name: 'program_name', type: 'text' },
    { name: 'program_url', type: 'text' },
    { name: 'match_iteration_id', type: 'integer' },
  ],
};

const PROGRAM_DESCRIPTIONS_STAGE: StagingTable<ProgramDescriptionRecord> = {
  name: 'stg_program_descriptions',
  columns: [
    { name: 'program_description_id', type: 'integer' },
    { name: 'program_stream_id', type: 'integer' },
    { name: 'source_url', type: 'text' },
    { name: 'document_id', type: 'text' },
    { name: 'match_iteration_id', type: 'integer' },
    { name: 'match_iteration_name', type: 'text' },
    { name: 'program_name', type: 'text' },
    { name: 'section_count', type: 'integer' },
  ],
};

const SECTIONS_STAGE: StagingTable<ProgramDescriptionSectionRecord> = {
  name: 'stg_sections',
  columns: [
    { name: 'program_description_id', type: 'integer' },
    { name: 'section_name', type: 'text' },
    { name: 'section_text', type: 'text' },
  ],
};

async function stageRows<T extends Row>(tx: Queryable, table: StagingTable<T>, rows: readonly T[]): Promise<void> {
  const definition = table.columns.map((column) => `${column.name} ${column.type}`).join(', ');
  await tx.query(`create temp table ${table.name} (${definition}) on commit drop`);

  const columnList = table.columns.map((column) => column.name).join(', ');
  for (let start = 0; start < rows.length; start += STAGE_BATCH_SIZE) {
    const chunk = rows.slice(start, start + STAGE_BATCH_SIZE);
    const values: unknown[] = [];
    const tuples = chunk.map((row) => {
      const placeholders = table.columns.map((column) => {
        values.push(row[column.name] ?? null);
        return `$${values.length}`;
      });
      return `(${placeholders.join(', ')})`;
    });
    await tx.query(`insert into ${table.name} (${columnList}) values ${tuples.join(', ')}`, values);
  }
}

type UpsertRow = { inserted: boolean };

function upsertChanges(rows: UpsertRow[]): TableChanges {
  const inserted = rows.filter((row) => row.inserted).length;
  return { inserted, updated: rows.length - inserted, deleted: 0 };
}

async function step<T>(table: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof EtlError) throw error;
    throw new LoadError(table, error);
  }
}

type IdentityClash = {
  program_stream_id: number;
  staged_url: string;
  stored_url: string;
  stored_id: number;
};

/**
 * A stored stream keeps its url and its id. A staged row that pairs either
 * with something else was resolved against identities that are no longer
 * current.
 */
async function checkStreamIdentities(tx: Queryable): Promise<void> {
  const { rows } = await tx.query<IdentityClash>(`
    select s.program_stream_id, s.program_url as staged_url, p.program_url as stored_url,
           p.program_stream_id as stored_id
    from stg_program_streams s
    join program_streams p
      on (p.program_stream_id = s.program_stream_id and p.program_url <> s.program_url)
      or (p.program_url = s.program_url and p.program_stream_id <> s.program_stream_id)
    order by s.program_stream_id
    limit 1
  `);
  const clash = rows[0];
  if (!clash) return;
  if (clash.stored_id === clash.program_stream_id) {
    throw new ConflictingReferenceError('program_stream_id', clash.program_stream_id, [
      clash.stored_url,
      clash.staged_url,
    ]);
  }
  throw new ConflictingReferenceError('program_url', clash.staged_url, [clash.stored_id, clash.program_stream_id]);
}

async function mergeBatch(tx: Queryable): Promise<Record<TableName, TableChanges>> {
  await step('program_streams', () => checkStreamIdentities(tx));

  const disciplines = await step('disciplines', async () => {
    const { rows } = await tx.query<UpsertRow>(`
      insert into disciplines (discipline_id, name)
      select discipline_id, name from stg_disciplines
      on conflict (discipline_id) do update set name = excluded.name
        where disciplines.name is distinct from excluded.name
      returning (xmax = 0) as inserted
    `);
    return upsertChanges(rows);
  });

  const schools = await step('schools', async () => {
    const { rows } = await tx.query<UpsertRow>(`
      insert into schools (school_id, name)
      select school_id, name from stg_schools
      on conflict (school_id) do update set name = excluded.name
        where schools.name is distinct from excluded.name
      returning (xmax = 0) as inserted
    `);
    return upsertChanges(rows);
  });

  const staleSections = await step('program_description_sections', async () => {
    const { rows } = await tx.query(`
      delete from program_description_sections sec
      where not exists (
        select 1 from stg_sections s
        where s.program_description_id = sec.program_description_id
          and s.section_name = sec.section_name
      )
      or exists (
        select 1 from program_descriptions d
        where d.program_description_id = sec.program_description_id
          and not exists (
            select 1 from stg_program_descriptions s
            where s.program_description_id = d.program_description_id
              and s.program_stream_id = d.program_stream_id
          )
      )
      returning sec.id
    `);
    return rows.length;
  });

  const staleDescriptions = await step('program_descriptions', async () => {
    const { rows } = await tx.query(`
      delete from program_descriptions d
      where not exists (
        select 1 from stg_program_descriptions s
        where s.program_description_id = d.program_description_id
          and s.program_stream_id = d.program_stream_id
      )
      returning d.program_description_id
    `);
    return rows.length;
  });

  const programStreams = await step('program_streams', async () => {
    const { rows } = await tx.query<UpsertRow>(`
      insert into program_streams (
        program_stream_id, discipline_id, school_id, stream_name, site, stream_label,
        program_name, program_url, match_iteration_id
      )
      select
        program_stream_id, discipline_id, school_id, stream_name, site, stream_label,
        program_name, program_url, match_iteration_id
      from stg_program_streams
      on conflict (program_stream_id) do update set
        discipline_id = excluded.discipline_id,
        school_id = excluded.school_id,
        stream_name = excluded.stream_name,
        site = excluded.site,
        stream_label = excluded.stream_label,
        program_name = excluded.program_name,
        match_iteration_id = excluded.match_iteration_id
      where (
        program_streams.discipline_id, program_streams.school_id, program_streams.stream_name,
        program_streams.site, program_streams.stream_label, program_streams.program_name,
        program_streams.match_iteration_id
      ) is distinct from (
        excluded.discipline_id, excluded.school_id, excluded.stream_name,
        excluded.site, excluded.stream_label, excluded.program_name,
        excluded.match_iteration_id
      )
      returning (xmax = 0) as inserted
    `);
    return upsertChanges(rows);
  });

  const programDescriptions = await step('program_descriptions', async () => {
    const { rows } = await tx.query<UpsertRow>(`
      insert into program_descriptions (
        program_description_id, program_stream_id, source_url, document_id,
        match_iteration_id, match_iteration_name, program_name, section_count
      )
      select
        program_description_id, program_stream_id, source_url, document_id,
        match_iteration_id, match_iteration_name, program_name, section_count
      from stg_program_descriptions
      on conflict (program_description_id) do update set
        source_url = excluded.source_url,
        document_id = excluded.document_id,
        match_iteration_id = excluded.match_iteration_id,
        match_iteration_name = excluded.match_iteration_name,
        program_name = excluded.program_name,
        section_count = excluded.section_count
      where (
        program_descriptions.source_url, program_descriptions.document_id,
        program_descriptions.match_iteration_id, program_descriptions.match_iteration_name,
        program_descriptions.program_name, program_descriptions.section_count
      ) is distinct from (
        excluded.source_url, excluded.document_id,
        excluded.match_iteration_id, excluded.match_iteration_name,
        excluded.program_name, excluded.section_count
      )
      returning (xmax = 0) as inserted
    `);
    return upsertChanges(rows);
  });

  const staleStreams = await step('program_streams', async () => {
    const { rows } = await tx.query(`
      delete from program_streams p
      where not exists (
        select 1 from stg_program_streams s where s.program_stream_id = p.program_stream_id
      )
      returning p.program_stream_id
    `);
    return rows.length;
  });

  const sections = await step('program_description_sections', async () => {
    const { rows } = await tx.query<UpsertRow>(`
      insert into program_description_sections (program_description_id, section_name, section_text)
      select program_description_id, section_name, section_text
      from stg_sections
      on conflict (program_description_id, section_name) do update set section_text = excluded.section_text
        where program_description_sections.section_text is distinct from excluded.section_text
      returning (xmax = 0) as inserted
    `);
    return upsertChanges(rows);
  });

  return {
    disciplines,
    schools,
    program_streams: { ...programStreams, deleted: staleStreams },
    program_descriptions: { ...programDescriptions, deleted: staleDescriptions },
    program_description_sections: { ...sections, deleted: staleSections },
  };
}

export type PreparedBatch = {
  batch: NormalizedBatch;
};

/**
 * Runs `prepare` and applies the batch it returns in one transaction, under a
 * lock shared by every process loading into the same database. `prepare` sees
 * the store as it is once the lock is held. Rows are replaced by key, rows
 * missing from the batch are removed, and any failure rolls the whole batch
 * back.
 */
export async function loadPrepared<T extends PreparedBatch>(
  db: Database,
  prepare: (tx: Queryable) => Promise<T>
): Promise<{ prepared: T; summary: LoadSummary }> {
  const { prepared, changes } = await db.transaction(async (tx) => {
    await step('lock', () => tx.query('select pg_advisory_xact_lock($1)', [LOAD_LOCK_KEY]));
    const prepared = await prepare(tx);
    const { batch } = prepared;
    await step('staging', async () => {
      await stageRows(tx, DISCIPLINES_STAGE, batch.disciplines);
      await stageRows(tx, SCHOOLS_STAGE, batch.schools);
      await stageRows(tx, PROGRAM_STREAMS_STAGE, batch.programStreams);
      await stageRows(tx, PROGRAM_DESCRIPTIONS_STAGE, batch.programDescriptions);
      await stageRows(tx, SECTIONS_STAGE, batch.sections);
    });
    return { prepared, changes: await mergeBatch(tx) };
  });
  return { prepared, summary: { counts: batchCounts(prepared.batch), changes } };
}

/** Applies an already normalized batch; see `loadPrepared`. */
export async function loadBatch(db: Database, batch: NormalizedBatch): Promise<LoadSummary> {
  const { summary } = await loadPrepared(db, async () => ({ batch }));
  return summary;
}

export async function loadKnownIdentities(db: Queryable): Promise<Array<[string, number]>> {
  const { rows } = await db.query<{ program_url: string; program_stream_id: number }>(
    'select program_url, program_stream_id from program_streams order by program_stream_id'
  );
  return rows.map((row) => [row.program_url, row.program_stream_id]);
}

export async function countTables(db: Queryable): Promise<TableCounts> {
  const { rows } = await db.query<TableCounts>(`
    select
      (select count(*) from disciplines)::int as disciplines,
      (select count(*) from schools)::int as schools,
      (select count(*) from program_streams)::int as program_streams,
      (select count(*) from program_descriptions)::int as program_descriptions,
      (select count(*) from program_description_sections)::int as program_description_sections
  `);
  const counts = rows[0];
  if (!counts) {
    throw new Error('table count query returned no row');
  }
  return counts;
}
